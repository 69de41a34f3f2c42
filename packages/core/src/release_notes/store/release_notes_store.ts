/**
 * Outcome of reading one JSON document from a release notes store.
 */
export type StoreReadResult =
  | { status: 'ok'; data: unknown }
  | { status: 'absent' }
  | { status: 'invalid'; reason: string };

/**
 * Source of release-note records, keyed by numeric version (`1.8.0`).
 *
 * Implementations:
 * - FsReleaseNotesStore: `{dir}/{version}.json`, `_`-prefixed files ignored
 * - MemoryReleaseNotesStore: In-memory for tests
 */
export interface ReleaseNotesStore {
  /** Versions that have a record, in no particular order */
  listVersions(): Promise<string[]>;
  readRecord(version: string): Promise<StoreReadResult>;
  /** Advisory JSON schema for records, if the project ships one */
  readSchema(): Promise<StoreReadResult>;
  /** Human-readable name of a record, for messages */
  describeRecord(version: string): string;
}
