import chalk from 'chalk';

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/**
 * Strip ANSI escape codes so widths count visible characters only
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_PATTERN, '');
}

/**
 * Pad a possibly colored string to a visible width.
 * Longer text is cut to the width and loses its styling.
 */
export function padVisible(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  const visible = stripAnsi(str);

  if (visible.length > width) {
    return visible.substring(0, width);
  }

  const padding = ' '.repeat(width - visible.length);
  return align === 'left' ? str + padding : padding + str;
}

/**
 * Frame content in a rounded border, with an optional title set into the top edge
 */
export function box(content: string, title?: string): string {
  const lines = content.split('\n');
  // Inner width: widest line plus a space of margin each side, or room for the title
  const inner = Math.max(
    ...lines.map((line) => stripAnsi(line).length + 2),
    title ? title.length + 3 : 0,
  );

  const top = title
    ? chalk.gray('╭─') + chalk.bold(` ${title} `) + chalk.gray('─'.repeat(inner - title.length - 3) + '╮')
    : chalk.gray('╭' + '─'.repeat(inner) + '╮');
  const body = lines.map((line) => `${chalk.gray('│')} ${padVisible(line, inner - 2)} ${chalk.gray('│')}`);
  const bottom = chalk.gray('╰' + '─'.repeat(inner) + '╯');

  return ['', top, ...body, bottom, ''].join('\n');
}
