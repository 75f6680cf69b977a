// ============================================================================
// Pipeline Module - Barrel Export
// ============================================================================

export type {
  DeliveryMode,
  FailedResult,
  FailureKind,
  MergeReport,
  MergeRunOptions,
  PreviewedResult,
  RunSummary,
  SendResult,
  SentResult,
} from './types.js';

export { runMerge, recipientDomain } from './run-merge.js';
export { summarizeResults, formatSummary } from './summary.js';
