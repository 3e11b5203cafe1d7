/**
 * Barrel export for all shared types.
 */
export { SOURCE_TAGS } from './record.js';
export type { SourceTag, TrackedField, BibRecord, BibRecordFields, ReferenceToVerify } from './record.js';
export type { SourceAdapter, SourceAdapterOptions, SearchOptions, ClinicalFilter } from './source-adapter.js';
export type {
    VerificationStatus,
    ComparedField,
    FieldMismatch,
    FieldCheck,
    ResolutionLayer,
    AttemptOutcome,
    LayerAttempt,
    VerificationResult,
} from './verification.js';
export type { Session, SearchLogEntry, CitationLinks, CitationDirection } from './session.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    ReconcileConfig,
    LogLevel,
    SourcePrecedence,
    MatchingConfig,
    VerificationConfig,
    SearchConfig,
    CacheConfig,
} from './config.js';
