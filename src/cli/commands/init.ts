import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { box } from '../../utils/ui';
import { getConfigPath } from '../../utils/paths';
import { defaultConfig, renderConfig } from '../../config';

export async function initCommand(projectPath: string, options: { force?: boolean }): Promise<void> {
  const configPath = getConfigPath(path.resolve(projectPath));

  if (fs.existsSync(configPath) && !options.force) {
    console.log(chalk.yellow(`\n  Config already exists: ${configPath}`));
    console.log(chalk.dim('  Use --force to overwrite.\n'));
    process.exitCode = 1;
    return;
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, renderConfig(defaultConfig()));

  console.log(
    box(
      chalk.green('✓') + ` Wrote ${configPath}\n\n` +
        'Next steps:\n' +
        '  • Edit sender details and discount rates\n' +
        `  • Try ${chalk.cyan('dispatch send email someone@example.com "Hello"')}`,
      'dispatch init'
    )
  );
}
