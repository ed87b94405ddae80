export { fuse, fuseWithReport, compareFusedItems, summarizeSources, formatSourceSummary } from './engine.js';
export type { FusionReport } from './engine.js';
export { assemble } from './assembler.js';
export { normalizeSourceBatch, clampScore } from './normalize.js';
export type { RejectedCandidate, RejectReason, ScoredCandidate } from './normalize.js';
export { groupCandidates, compareIdentifiers } from './dedup.js';
export type { CandidateGroup } from './dedup.js';
