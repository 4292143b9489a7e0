import chalk from 'chalk';
import * as path from 'path';
import type { App } from '../../app';
import { box } from '../../utils/ui';

export async function statusCommand(app: App): Promise<void> {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration\n'));
  if (app.configSource.source === 'file') {
    lines.push(chalk.green('✓') + ` Loaded ${app.configSource.path}`);
  } else {
    lines.push(chalk.yellow('○') + ' Using defaults (run ' + chalk.cyan('dispatch init') + ')');
  }
  lines.push(chalk.dim('  Outbox: ' + path.resolve(app.projectRoot, app.config.notifications.outbox)));

  lines.push('');
  lines.push(chalk.bold('Registered variants:'));
  lines.push(`  • ${app.notifiers.name}: ` + app.notifiers.discriminators().join(', '));
  lines.push(`  • ${app.discounts.name}: ` + app.discounts.discriminators().join(', '));

  console.log(box(lines.join('\n'), 'dispatch status'));
}
