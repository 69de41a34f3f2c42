import type { MissingRecordsError, RecordValidationError, ValidationError } from '../errors';
import type { CompletenessMode } from '../config_manager/config_manager.types';

export const CHANGE_CATEGORIES = ['breaking', 'security', 'features', 'improvements', 'fixes', 'docs'] as const;

export type ChangeCategory = typeof CHANGE_CATEGORIES[number];

export const CATEGORY_TITLES: Readonly<Record<ChangeCategory, string>> = {
  breaking: 'Breaking Changes',
  security: 'Security',
  features: 'New Features',
  improvements: 'Improvements',
  fixes: 'Bug Fixes',
  docs: 'Documentation',
};

export type ChangeItem = {
  description: string;
  /** Issue or PR reference, rendered in parentheses */
  issue?: string;
};

/**
 * Structured notes for one version, stored as `{version}.json`.
 * `version`, `date` and `tag` are required by validation but may be absent
 * in a file on disk; rendering tolerates that.
 */
export type ReleaseNoteRecord = {
  version?: string;
  date?: string;
  tag?: string;
  summary?: string;
  highlights?: string[];
  changes?: Partial<Record<ChangeCategory, ChangeItem[]>>;
  components?: string[];
  notes?: string;
};

export type ReleaseNotesDocument = {
  /** Versions rendered, in document order */
  versions: string[];
  markdown: string;
  warnings: string[];
};

export type MissingVersion = {
  version: string;
  tag: string;
};

export type InvalidRecord = {
  version: string;
  errors: ValidationError[];
};

export type CompletenessReport = {
  mode: CompletenessMode;
  passed: boolean;
  /** Numeric versions whose release tag has no record */
  missing: string[];
  invalid: InvalidRecord[];
  /** Set when the check failed in strict mode */
  error?: MissingRecordsError | RecordValidationError;
};
