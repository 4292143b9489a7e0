/**
 * Notification commands - list channels, send, show the outbox
 */

import chalk from 'chalk';
import ora from 'ora';
import type { App } from '../../app';
import type { DeliveryResult, Notifier, OutboxRecord } from '../../notifications';
import { box, padVisible } from '../../utils/ui';
import { reportUnknownVariant } from '../errors';

export async function channelsCommand(app: App, options: { json?: boolean }): Promise<void> {
  const channels = app.notifiers.discriminators();

  if (options.json) {
    console.log(JSON.stringify(channels, null, 2));
    return;
  }

  console.log(box(
    chalk.bold(`${channels.length} channel${channels.length === 1 ? '' : 's'}\n\n`) +
    channels.map((c) => `  • ${chalk.cyan(c)}`).join('\n'),
    'Channels'
  ));
}

export async function sendCommand(
  app: App,
  channel: string,
  recipient: string,
  body: string,
  options: { subject?: string; json?: boolean },
): Promise<void> {
  let notifier: Notifier;
  try {
    notifier = app.notifiers.create(channel);
  } catch (err) {
    if (reportUnknownVariant(err)) {
      return;
    }
    throw err;
  }

  const spinner = ora(`Delivering via ${notifier.channel}...`).start();
  let result: DeliveryResult;
  try {
    result = await notifier.deliver({ to: recipient, subject: options.subject, body });
  } finally {
    spinner.stop();
  }

  if (!result.success) {
    process.exitCode = 1;
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓') + ` Delivered ${result.messageId} via ${result.channel} to ${result.recipient}`);
  } else {
    console.log(chalk.red('✗') + ` ${result.error}`);
  }
}

function formatRecordRow(record: OutboxRecord): string {
  const idCol = padVisible(record.messageId, 24);
  const channelCol = padVisible(chalk.cyan(record.channel), 8);
  const recipientCol = padVisible(record.recipient.substring(0, 30), 30);
  return `  ${idCol}  ${channelCol}  ${recipientCol}  ${chalk.dim(record.deliveredAt)}`;
}

export async function outboxCommand(app: App, options: { json?: boolean }): Promise<void> {
  const records = await app.outbox.list();

  if (options.json) {
    console.log(JSON.stringify(records, null, 2));
    return;
  }

  if (records.length === 0) {
    console.log(box(chalk.dim('Outbox is empty.'), 'Outbox'));
    return;
  }

  console.log(box(
    chalk.bold(`${records.length} message${records.length === 1 ? '' : 's'}\n\n`) +
    records.map(formatRecordRow).join('\n'),
    'Outbox'
  ));
}
