/**
 * Barrel export for all shared types.
 */
export type { Article, Author, Volume, Corpus } from './corpus.js';
export { GENDER_LABELS } from './mention.js';
export type { GenderLabel, MentionKind, Mention, Resolution, ResolutionSource } from './mention.js';
export type { PrnEntry, PrnGender, PrnConflictPolicy } from './prn.js';
export type { GenderLookup, KnowledgeBaseCandidate } from './knowledge-base.js';
export { CONNOTATION_DIMENSIONS, GENDER_WRITING_KINDS } from './stats.js';
export type {
    GroupBy,
    ConnotationScore,
    ConnotationSummary,
    AggregateRecord,
    GenderWritingKind,
    GenderWritingCounts,
    GenderWritingMatch,
} from './stats.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    GenderscopeConfig,
    LogLevel,
    GenderLookupProvider,
    KnowledgeBaseConfig,
    PrnConfig,
    OutputConfig,
    RunRecord,
} from './config.js';
