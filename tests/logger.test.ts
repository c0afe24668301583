import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeLogger } from '../src/logger.js';

describe('makeLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mime-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('truncates the log file and writes JSON lines', async () => {
    const file = join(dir, 'mime.log');
    await writeFile(file, 'previous run\n', 'utf-8');

    const logger = makeLogger({ file, level: 'info' });
    logger.info({ channelId: '42' }, 'Processing message');
    logger.debug('below the level');

    const lines = (await readFile(file, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 30,
      service: 'mime',
      channelId: '42',
      msg: 'Processing message',
    });
  });

  it('redacts tokens', async () => {
    const file = join(dir, 'nested', 'mime.log');

    const logger = makeLogger({ file, level: 'info' });
    logger.info({ discord: { token: 'test-secret' } }, 'config');

    const entry: unknown = JSON.parse(await readFile(file, 'utf-8'));
    expect(entry).toMatchObject({ discord: { token: '[REDACTED]' } });
  });
});
