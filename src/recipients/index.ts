// ============================================================================
// Recipients Module: Barrel Export
// ============================================================================

export type {
  RecipientRecord,
  RejectedRow,
  ColumnMapping,
  LoadRecipientsResult,
} from './types.js';
export { DEFAULT_COLUMNS } from './types.js';

export { loadRecipients, requiredHeaders, splitList } from './loader.js';
