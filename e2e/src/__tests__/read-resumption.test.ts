/**
 * @widecol/e2e - Read Resumption System Test
 *
 * Reads that lose their stream mid-row or between rows pick up where the
 * last committed row left off.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createTestLogger, decodeUtf8, RetryError, type TestLogger } from '@widecol/core';
import type { Table } from '@widecol/client';
import type { Emulator } from '@widecol/emulator';

import { COL_NAME1, COLUMN_FAMILY_ID1, createSystemEnv } from '../fixtures.js';

describe('Read resumption', () => {
  let emulator: Emulator;
  let table: Table;
  let logger: TestLogger;

  beforeEach(async () => {
    logger = createTestLogger({ minLevel: 'warn' });
    const env = await createSystemEnv({
      emulator: { chunksPerResponse: 1, maxChunkValueBytes: 4 },
      config: { read: { initialRetryDelayMs: 0, maxRetryDelayMs: 0, retryJitter: false, maxRetries: 3 } },
      logger,
    });
    emulator = env.emulator;
    table = env.instance.table('resumption-table');
    await table.create({ columnFamilies: { [COLUMN_FAMILY_ID1]: undefined } });

    await table.row('a').setCell(COLUMN_FAMILY_ID1, COL_NAME1, 'abcdefghij', { timestamp: 1_000 }).commit();
    await table.row('b').setCell(COLUMN_FAMILY_ID1, COL_NAME1, 'xyz', { timestamp: 1_000 }).commit();
  });

  it('restarts a row cut off mid-value and resumes after a committed row', async () => {
    emulator.failNextRead({ afterChunks: 2 });
    emulator.failNextRead({ afterChunks: 3 });

    const reader = table.readRows();
    await reader.consumeAll();

    expect(decodeUtf8(reader.rows.get('a')?.cellValue(COLUMN_FAMILY_ID1, COL_NAME1) ?? new Uint8Array())).toBe(
      'abcdefghij'
    );
    expect(decodeUtf8(reader.rows.get('b')?.cellValue(COLUMN_FAMILY_ID1, COL_NAME1) ?? new Uint8Array())).toBe('xyz');
    expect(emulator.pendingReadFaults).toBe(0);

    const warnings = logger.getLogsByLevel('warn');
    expect(warnings.map(entry => entry.message)).toEqual([
      'Read stream interrupted, resuming',
      'Read stream interrupted, resuming',
    ]);
    expect(warnings[0].context?.resumeAfter).toBeUndefined();
    expect(warnings[1].context?.resumeAfter).toBe('a');
  });

  it('gives up after the configured number of retries', async () => {
    for (let i = 0; i < 4; i++) {
      emulator.failNextRead();
    }

    const reader = table.readRows();

    await expect(reader.consumeAll()).rejects.toThrow(RetryError);
    expect(reader.state).toBe('failed');
    expect(emulator.pendingReadFaults).toBe(0);
  });
});
