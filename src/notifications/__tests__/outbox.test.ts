import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { FileOutbox, MemoryOutbox } from '../outbox';
import type { OutboxRecord } from '../types';

function record(messageId: string): OutboxRecord {
  return {
    messageId,
    channel: 'push',
    recipient: 'device-token-1',
    payload: { token: 'device-token-1', title: 'Notification', body: 'Hi' },
    deliveredAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('FileOutbox', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dispatchkit-outbox-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('should return an empty list when the file does not exist', async () => {
    const outbox = new FileOutbox(path.join(tempDir, 'missing.jsonl'));

    expect(await outbox.list()).toEqual([]);
  });

  it('should create the directory and append JSON lines', async () => {
    const filePath = path.join(tempDir, 'nested', 'outbox.jsonl');
    const outbox = new FileOutbox(filePath);

    await outbox.append(record('msg-1-aaaaaa'));
    await outbox.append(record('msg-2-bbbbbb'));

    const lines = fs.readFileSync(filePath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0]).messageId).toBe('msg-1-aaaaaa');
    expect(await outbox.list()).toEqual([record('msg-1-aaaaaa'), record('msg-2-bbbbbb')]);
  });

  it('should skip malformed lines with a warning', async () => {
    const filePath = path.join(tempDir, 'outbox.jsonl');
    fs.writeFileSync(filePath, [
      JSON.stringify(record('msg-1-aaaaaa')),
      '{not json',
      JSON.stringify({ messageId: 'msg-3-cccccc' }),
      '',
    ].join('\n'));
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const records = await new FileOutbox(filePath).list();

    expect(records).toEqual([record('msg-1-aaaaaa')]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(`Warning: skipping malformed outbox line 2 in ${filePath}`);
    expect(warn).toHaveBeenCalledWith(`Warning: skipping malformed outbox line 3 in ${filePath}`);
  });
});

describe('MemoryOutbox', () => {
  it('should return a copy of its records', async () => {
    const outbox = new MemoryOutbox();
    await outbox.append(record('msg-1-aaaaaa'));

    const listed = await outbox.list();
    listed.pop();

    expect(await outbox.list()).toHaveLength(1);
  });
});
