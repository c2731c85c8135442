// ============================================================================
// Classification Module — Barrel Export
// ============================================================================
//
// Public API for document classification and staging.
//
// Provides:
// - Types (ClassificationResult, ClassificationContext)
// - classifyDocument: one document -> identifier, recipient, staged copy
// - classifyDocuments / listSourceDocuments: bounded-concurrency batch

export type { ClassificationResult, ClassificationContext } from './types.js';

export { classifyDocument } from './classifier.js';

export { classifyDocuments, listSourceDocuments, defaultConcurrency } from './batch.js';
