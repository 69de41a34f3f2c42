import type { ReleaseNotesStore, StoreReadResult } from '../release_notes_store';

/**
 * In-memory ReleaseNotesStore for tests.
 *
 * @example
 * ```typescript
 * const store = new MemoryReleaseNotesStore();
 * store.setRecord('1.2.0', { version: '1.2.0', date: '2026-01-15', tag: 'v1.2.0' });
 * store.setRawRecord('1.1.0', '{ broken');
 * ```
 */
export class MemoryReleaseNotesStore implements ReleaseNotesStore {
  private records = new Map<string, StoreReadResult>();
  private schema: StoreReadResult = { status: 'absent' };

  async listVersions(): Promise<string[]> {
    return [...this.records.keys()];
  }

  async readRecord(version: string): Promise<StoreReadResult> {
    return this.records.get(version) ?? { status: 'absent' };
  }

  async readSchema(): Promise<StoreReadResult> {
    return this.schema;
  }

  describeRecord(version: string): string {
    return `${version}.json`;
  }

  // ==================== Test Helper Methods ====================

  setRecord(version: string, data: unknown): void {
    this.records.set(version, { status: 'ok', data });
  }

  /**
   * Stores text as if read from disk; unparseable text reads as invalid.
   */
  setRawRecord(version: string, text: string): void {
    try {
      const data: unknown = JSON.parse(text);
      this.records.set(version, { status: 'ok', data });
    } catch (error) {
      this.records.set(version, {
        status: 'invalid',
        reason: `Invalid JSON in ${version}.json: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  setSchema(schema: object | null): void {
    this.schema = schema ? { status: 'ok', data: schema } : { status: 'absent' };
  }

  clear(): void {
    this.records.clear();
    this.schema = { status: 'absent' };
  }
}
