// ============================================================================
// Lookup Module — Barrel Export
// ============================================================================

export type { LookupRow, LookupTable, LookupColumns, SkippedRow } from './types.js';
export { loadLookupTable, parseLookupTable, LookupTableError } from './table.js';
export { resolveRecipient } from './resolver.js';
