// @widecol/emulator
// In-process server for the widecol data and admin APIs

export {
  Emulator,
  DEFAULT_MAX_CHUNK_VALUE_BYTES,
  DEFAULT_CHUNKS_PER_RESPONSE,
  type EmulatorOptions,
  type ReadFaultOptions,
} from './emulator.js';

export { compileFilter, compareFlatCells, type FlatCell, type CompiledFilter } from './filters.js';
export { applyGCRule, collectableCells } from './gc.js';
export { rowToChunks, toResponses, type OutputRow, type ChunkerOptions } from './chunker.js';
export { TableState } from './table-state.js';
export { parseRequest } from './schemas.js';
