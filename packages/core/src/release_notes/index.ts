export { ReleaseNotesAggregator, DEFAULT_NOTES_FILENAME } from './release_notes_aggregator';
export type { ReleaseNotesAggregatorOptions } from './release_notes_aggregator';
export { renderRecord, renderDocument, formatTimestamp } from './release_notes_renderer';
export { validateRecord, validateRecordAgainstSchema, toReleaseNoteRecord } from './release_notes_validator';
export { CHANGE_CATEGORIES, CATEGORY_TITLES } from './release_notes.types';
export type {
  ChangeCategory,
  ChangeItem,
  ReleaseNoteRecord,
  ReleaseNotesDocument,
  MissingVersion,
  InvalidRecord,
  CompletenessReport,
} from './release_notes.types';
export type { ReleaseNotesStore, StoreReadResult } from './store';
