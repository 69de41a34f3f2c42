import * as path from 'path';
import type { ReleaseNotesStore } from './store/release_notes_store';
import type {
  CompletenessReport,
  InvalidRecord,
  MissingVersion,
  ReleaseNoteRecord,
  ReleaseNotesDocument,
} from './release_notes.types';
import type { CompletenessMode } from '../config_manager/config_manager.types';
import type { ValidationError } from '../errors';
import { MissingRecordsError, RecordValidationError } from '../errors';
import { compareVersionNumbers, isReleaseTag, toNumeric } from '../version';
import { isPlainObject, toReleaseNoteRecord, validateRecord, validateRecordAgainstSchema } from './release_notes_validator';
import { renderDocument, renderRecord } from './release_notes_renderer';
import { writeFileAtomic } from '../utils/fs_helpers';
import { createLogger } from '../logger';

const logger = createLogger('[ReleaseNotes] ');

export const DEFAULT_NOTES_FILENAME = 'RELEASE-NOTES.md';

export type ReleaseNotesAggregatorOptions = {
  store: ReleaseNotesStore;
  /** Product name used in the document title */
  product: string;
  /** Clock for the `Generated:` line */
  now?: () => Date;
};

type LoadedRecord = {
  record: ReleaseNoteRecord;
  errors: ValidationError[];
};

/**
 * Loads, validates and renders the per-version release-note records.
 *
 * Absent records are normal. Invalid ones become warnings: an unparseable
 * file is skipped, a record with field errors is still rendered.
 */
export class ReleaseNotesAggregator {
  private readonly store: ReleaseNotesStore;
  private readonly product: string;
  private readonly now: () => Date;
  private schemaCache: Promise<object | null> | null = null;

  constructor(options: ReleaseNotesAggregatorOptions) {
    this.store = options.store;
    this.product = options.product;
    this.now = options.now ?? (() => new Date());
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RECORDS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Record for a version (`1.2.3` or `v1.2.3`), or null when there is none
   * or it cannot be parsed.
   */
  async load(version: string): Promise<ReleaseNoteRecord | null> {
    const warnings: string[] = [];
    const loaded = await this.loadRecord(toNumeric(version), warnings);
    warnings.forEach(warning => logger.warn(warning));
    return loaded?.record ?? null;
  }

  validate(record: unknown, expectedVersion: string): ValidationError[] {
    return validateRecord(record, toNumeric(expectedVersion));
  }

  render(record: ReleaseNoteRecord): string {
    return renderRecord(record);
  }

  /**
   * Versions with a record, newest first.
   */
  async listVersions(): Promise<string[]> {
    const versions = await this.store.listVersions();
    return versions.sort((a, b) => compareVersionNumbers(b, a));
  }

  private async loadSchema(): Promise<object | null> {
    if (!this.schemaCache) {
      this.schemaCache = this.store.readSchema().then((result) => {
        if (result.status === 'invalid') {
          logger.warn(`Ignoring release notes schema: ${result.reason}`);
          return null;
        }
        return result.status === 'ok' && isPlainObject(result.data) ? result.data : null;
      });
    }
    return this.schemaCache;
  }

  private async loadRecord(version: string, warnings: string[]): Promise<LoadedRecord | null> {
    const result = await this.store.readRecord(version);
    if (result.status === 'absent') return null;
    if (result.status === 'invalid') {
      warnings.push(result.reason);
      return null;
    }
    if (!isPlainObject(result.data)) {
      warnings.push(`${this.store.describeRecord(version)}: Record must be a JSON object`);
      return null;
    }

    const errors = validateRecord(result.data, version);
    errors.forEach(error => warnings.push(`${this.store.describeRecord(version)}: ${error.message}`));

    const schema = await this.loadSchema();
    if (schema) {
      try {
        validateRecordAgainstSchema(result.data, schema)
          .forEach(error => warnings.push(`${this.store.describeRecord(version)}: ${error.message}`));
      } catch (error) {
        warnings.push(`Release notes schema could not be applied: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return { record: toReleaseNoteRecord(result.data), errors };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // DOCUMENT
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Builds the aggregated document. With `versions`, renders that subset in
   * the given order, once each, silently dropping versions without a record; otherwise
   * every record, newest first.
   */
  async aggregate(versions?: string[]): Promise<ReleaseNotesDocument> {
    const existing = await this.listVersions();
    const selected = versions && versions.length > 0
      ? [...new Set(versions.map(v => toNumeric(v)))].filter(v => existing.includes(v))
      : existing;

    const warnings: string[] = [];
    const rendered: string[] = [];
    const sections: string[] = [];

    for (const version of selected) {
      const loaded = await this.loadRecord(version, warnings);
      if (!loaded) continue;
      rendered.push(version);
      sections.push(renderRecord(loaded.record));
    }

    warnings.forEach(warning => logger.warn(warning));
    return {
      versions: rendered,
      markdown: renderDocument(this.product, this.now(), sections),
      warnings,
    };
  }

  /**
   * Writes the document via temp file and rename.
   *
   * @returns path of the written file
   */
  async writeDocument(
    document: ReleaseNotesDocument,
    outputDir: string,
    filename: string = DEFAULT_NOTES_FILENAME
  ): Promise<string> {
    const target = path.join(outputDir, filename);
    await writeFileAtomic(target, document.markdown);
    logger.info(`Generated: ${target}`);
    return target;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COMPLETENESS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Numeric versions of `vX.Y.Z` tags that have no record, in tag order.
   * Other tags are ignored.
   */
  async checkCompleteness(knownTags: string[]): Promise<string[]> {
    return (await this.listMissing(knownTags)).map(missing => missing.version);
  }

  async listMissing(knownTags: string[]): Promise<MissingVersion[]> {
    const existing = new Set(await this.store.listVersions());
    return knownTags
      .filter(isReleaseTag)
      .map(tag => ({ tag, version: toNumeric(tag) }))
      .filter(({ version }) => !existing.has(version));
  }

  /**
   * CI gate: records must exist for every release tag and pass validation.
   * `strict` fails on any finding; `warn-only` always passes.
   */
  async check(options: { knownTags: string[]; mode: CompletenessMode }): Promise<CompletenessReport> {
    const missing = await this.checkCompleteness(options.knownTags);
    const invalid: InvalidRecord[] = [];

    for (const version of await this.listVersions()) {
      const result = await this.store.readRecord(version);
      if (result.status === 'invalid') {
        invalid.push({ version, errors: [{ field: 'root', message: result.reason, value: null }] });
      } else if (result.status === 'ok') {
        const errors = validateRecord(result.data, version);
        if (errors.length > 0) invalid.push({ version, errors });
      }
    }

    const clean = missing.length === 0 && invalid.length === 0;
    const report: CompletenessReport = {
      mode: options.mode,
      passed: clean || options.mode === 'warn-only',
      missing,
      invalid,
    };

    if (!clean && options.mode === 'strict') {
      const firstInvalid = invalid[0];
      if (missing.length > 0) {
        report.error = new MissingRecordsError(missing);
      } else if (firstInvalid) {
        report.error = new RecordValidationError(firstInvalid.version, firstInvalid.errors);
      }
    }
    return report;
  }
}
