/**
 * @widecol/e2e - System tests
 *
 * Runs the public client API against the in-process emulator:
 * - Instance and app profile administration
 * - Table and column family administration
 * - Mutations, reads, filters and row-range drops
 *
 * @packageDocumentation
 */

export {
  createSystemEnv,
  deleteRows,
  writeToRows,
  type SystemEnv,
  type SystemEnvOptions,
  type WrittenCells,
} from './fixtures.js';
