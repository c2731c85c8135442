// ============================================================================
// Extraction Module — Barrel Export
// ============================================================================

export { IDENTIFIER_LABEL, IDENTIFIER_PATTERN, findIdentifier, isIdentifier } from './identifier.js';
export { extractPdfText } from './pdf-text.js';
export type { TextExtractor } from './pdf-text.js';
export { extractIdentifier } from './extractor.js';
export type { ExtractorDeps } from './extractor.js';
