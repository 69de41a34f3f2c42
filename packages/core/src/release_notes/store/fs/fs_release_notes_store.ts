import { promises as fs } from 'fs';
import * as path from 'path';
import type { ReleaseNotesStore, StoreReadResult } from '../release_notes_store';
import { isErrnoException, readDirSorted } from '../../../utils/fs_helpers';

export const SCHEMA_FILE_NAME = '_schema.json';

/**
 * Reads `{dir}/{version}.json` records. A missing directory is an empty
 * store.
 */
export class FsReleaseNotesStore implements ReleaseNotesStore {
  constructor(private readonly dir: string) {}

  async listVersions(): Promise<string[]> {
    const names = (await readDirSorted(this.dir)) ?? [];
    return names
      .filter(name => name.endsWith('.json') && !name.startsWith('_'))
      .map(name => name.slice(0, -'.json'.length));
  }

  async readRecord(version: string): Promise<StoreReadResult> {
    return this.readJson(path.join(this.dir, `${version}.json`));
  }

  async readSchema(): Promise<StoreReadResult> {
    return this.readJson(path.join(this.dir, SCHEMA_FILE_NAME));
  }

  describeRecord(version: string): string {
    return path.join(this.dir, `${version}.json`);
  }

  private async readJson(file: string): Promise<StoreReadResult> {
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { status: 'absent' };
      }
      throw error;
    }

    try {
      const data: unknown = JSON.parse(content);
      return { status: 'ok', data };
    } catch (error) {
      return { status: 'invalid', reason: `Invalid JSON in ${file}: ${error instanceof Error ? error.message : String(error)}` };
    }
  }
}
