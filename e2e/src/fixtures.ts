/**
 * Shared setup for the system tests: an emulator-backed admin client, one
 * instance per suite, and the cell fixtures the data tests write.
 */

import { Cell, truncateToMillis, type Logger } from '@widecol/core';
import type { DeepPartial, WidecolConfig } from '@widecol/config';
import type { Client, DirectRow, Instance } from '@widecol/client';
import type { Emulator, EmulatorOptions } from '@widecol/emulator';
import { createEmulatedClient, uniqueResourceId } from '@widecol/test-utils';

// =============================================================================
// Constants
// =============================================================================

export const LOCATION_ID = 'us-central1-c';
export const LABEL_KEY = 'system-test';
export const LABELS = Object.freeze({ [LABEL_KEY]: 'e2e' });

export const COLUMN_FAMILY_ID1 = 'col-fam-id1';
export const COLUMN_FAMILY_ID2 = 'col-fam-id2';
export const COL_NAME1 = 'col-name1';
export const COL_NAME2 = 'col-name2';
export const COL_NAME3 = 'col-name3-but-other-fam';
export const CELL_VAL1 = 'cell-val';
export const CELL_VAL2 = 'cell-val-newer';
export const CELL_VAL3 = 'altcol-cell-val';
export const CELL_VAL4 = 'foo';
export const ROW_KEY = 'row-key';
export const ROW_KEY_ALT = 'row-key-alt';

/** Wall clock the suite's emulator reports, in milliseconds */
export const NOW_MS = 1_700_000_000_000;

// =============================================================================
// Environment
// =============================================================================

export interface SystemEnv {
  client: Client;
  emulator: Emulator;
  /** Instance created for the suite */
  instance: Instance;
}

export interface SystemEnvOptions {
  emulator?: EmulatorOptions;
  config?: DeepPartial<WidecolConfig>;
  logger?: Logger;
}

/**
 * Start an emulator and create the suite's instance on it, leaving the type
 * for the server to pick.
 */
export async function createSystemEnv(options: SystemEnvOptions = {}): Promise<SystemEnv> {
  const { client, emulator } = createEmulatedClient({
    emulator: { now: () => NOW_MS, ...options.emulator },
    config: options.config,
    logger: options.logger,
  });
  const instanceId = `g-c-p${uniqueResourceId('-')}`.slice(0, 33);
  const instance = client.instance(instanceId, { labels: { ...LABELS } });
  await (await instance.create({ locationId: LOCATION_ID })).result();
  return { client, emulator, instance };
}

/**
 * Clear and delete every row, the way a suite cleans up after each test.
 */
export async function deleteRows(rows: readonly DirectRow[]): Promise<void> {
  for (const row of rows) {
    row.clear();
    row.delete();
    await row.commit();
  }
}

// =============================================================================
// Cell Fixtures
// =============================================================================

export interface WrittenCells {
  cell1: Cell;
  cell2: Cell;
  cell3: Cell;
  cell4: Cell;
}

/**
 * Stage four cells one millisecond apart, each on the row given for it:
 * `COL_NAME1` twice, `COL_NAME2` in the first family and `COL_NAME3` in the
 * second. Returns the cells a read should give back.
 */
export function writeToRows(
  rows: { row1?: DirectRow; row2?: DirectRow; row3?: DirectRow; row4?: DirectRow },
  baseMicros = NOW_MS * 1000
): WrittenCells {
  const timestamp1 = truncateToMillis(baseMicros);
  const timestamp2 = timestamp1 + 1000;
  const timestamp3 = timestamp1 + 2000;
  const timestamp4 = timestamp1 + 3000;

  rows.row1?.setCell(COLUMN_FAMILY_ID1, COL_NAME1, CELL_VAL1, { timestamp: timestamp1 });
  rows.row2?.setCell(COLUMN_FAMILY_ID1, COL_NAME1, CELL_VAL2, { timestamp: timestamp2 });
  rows.row3?.setCell(COLUMN_FAMILY_ID1, COL_NAME2, CELL_VAL3, { timestamp: timestamp3 });
  rows.row4?.setCell(COLUMN_FAMILY_ID2, COL_NAME3, CELL_VAL4, { timestamp: timestamp4 });

  return {
    cell1: new Cell(CELL_VAL1, timestamp1),
    cell2: new Cell(CELL_VAL2, timestamp2),
    cell3: new Cell(CELL_VAL3, timestamp3),
    cell4: new Cell(CELL_VAL4, timestamp4),
  };
}
