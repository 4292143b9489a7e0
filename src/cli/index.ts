#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createApp } from '../app';
import { initCommand } from './commands/init';
import { channelsCommand, sendCommand, outboxCommand } from './commands/channels';
import { discountsCommand, quoteCommand } from './commands/discounts';
import { statusCommand } from './commands/status';

type JsonOption = { json?: boolean };

// Built per invocation and passed down; commands never look it up globally
const app = () => createApp({ projectRoot: process.cwd() });

const program = new Command();

program
  .name('dispatch')
  .description('Pick notification channels and discount strategies by name.')
  .version('0.1.0');

program
  .command('init')
  .description('Write a default .dispatchkit/config.yaml')
  .argument('[path]', 'Path to project', '.')
  .option('-f, --force', 'Overwrite an existing config')
  .action((projectPath: string, opts: { force?: boolean }) => initCommand(projectPath, opts));

program
  .command('channels')
  .description('List notification channels')
  .option('--json', 'Output as JSON')
  .action((opts: JsonOption) => channelsCommand(app(), opts));

program
  .command('send')
  .description('Deliver a message through a channel')
  .argument('<channel>', 'Channel name (email, sms, push)')
  .argument('<recipient>', 'Email address, phone number or device token')
  .argument('<body>', 'Message body')
  .option('-s, --subject <text>', 'Subject (email) or title (push)')
  .option('--json', 'Output as JSON')
  .action((channel: string, recipient: string, body: string, opts: { subject?: string } & JsonOption) =>
    sendCommand(app(), channel, recipient, body, opts));

program
  .command('outbox')
  .description('List delivered messages')
  .option('--json', 'Output as JSON')
  .action((opts: JsonOption) => outboxCommand(app(), opts));

program
  .command('discounts')
  .description('List discount strategies')
  .option('--json', 'Output as JSON')
  .action((opts: JsonOption) => discountsCommand(app(), opts));

program
  .command('quote')
  .description('Price an amount with a discount strategy')
  .argument('<strategy>', 'Strategy name (none, percentage, fixed)')
  .argument('<amount>', 'Amount, e.g. 19.99')
  .option('--json', 'Output as JSON')
  .action((strategy: string, amount: string, opts: JsonOption) => quoteCommand(app(), strategy, amount, opts));

program
  .command('status')
  .description('Show configuration and registered variants')
  .action(() => statusCommand(app()));

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`\n  ${err instanceof Error ? err.message : String(err)}\n`));
  process.exitCode = 1;
});
