import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ReleaseNotesAggregator } from './release_notes_aggregator';
import { MemoryReleaseNotesStore } from './store/memory/memory_release_notes_store';
import { MissingRecordsError, RecordValidationError } from '../errors';

const GENERATED_AT = new Date(2026, 0, 15, 9, 30, 0);
const HEADER = '# tool Release Notes\n\nGenerated: 2026-01-15 09:30:00\n\n---\n\n';

function record(version: string, extra: Record<string, unknown> = {}) {
  return { version, date: '2026-01-01', tag: `v${version}`, ...extra };
}

describe('ReleaseNotesAggregator', () => {
  let store: MemoryReleaseNotesStore;
  let aggregator: ReleaseNotesAggregator;

  beforeEach(() => {
    store = new MemoryReleaseNotesStore();
    aggregator = new ReleaseNotesAggregator({ store, product: 'tool', now: () => GENERATED_AT });
  });

  describe('load', () => {
    it('should return null for an absent record', async () => {
      expect(await aggregator.load('1.0.0')).toBeNull();
    });

    it('should accept tag or numeric form', async () => {
      store.setRecord('1.2.0', record('1.2.0', { summary: 'Hello' }));

      expect(await aggregator.load('v1.2.0')).toEqual(record('1.2.0', { summary: 'Hello' }));
    });

    it('should treat unparseable JSON as absent', async () => {
      store.setRawRecord('1.2.0', '{ "version": ');

      expect(await aggregator.load('1.2.0')).toBeNull();
    });
  });

  it('validate should use the numeric form of the expected version', () => {
    expect(aggregator.validate(record('1.2.0'), 'v1.2.0')).toEqual([]);
  });

  describe('aggregate', () => {
    it('should render all records newest first by numeric version', async () => {
      store.setRecord('1.9.0', record('1.9.0'));
      store.setRecord('1.10.0', record('1.10.0'));
      store.setRecord('1.2.3', record('1.2.3'));

      const document = await aggregator.aggregate();

      expect(document.versions).toEqual(['1.10.0', '1.9.0', '1.2.3']);
      expect(document.warnings).toEqual([]);
      expect(document.markdown.split('\n').filter(line => line.startsWith('## '))).toEqual([
        '## 1.10.0',
        '## 1.9.0',
        '## 1.2.3',
      ]);
    });

    it('should keep the requested order and drop versions without records', async () => {
      store.setRecord('1.0.0', record('1.0.0'));
      store.setRecord('2.0.0', record('2.0.0'));

      const document = await aggregator.aggregate(['1.0.0', 'v3.0.0', 'v2.0.0']);

      expect(document.versions).toEqual(['1.0.0', '2.0.0']);
    });

    it('should render a version requested twice only once', async () => {
      store.setRecord('1.0.0', record('1.0.0'));
      store.setRecord('2.0.0', record('2.0.0'));

      const document = await aggregator.aggregate(['2.0.0', '1.0.0', 'v2.0.0']);

      expect(document.versions).toEqual(['2.0.0', '1.0.0']);
      expect(document.markdown.split('\n').filter(line => line.startsWith('## '))).toHaveLength(2);
    });

    it('should render the exact document for a single record', async () => {
      store.setRecord('1.0.0', record('1.0.0', { summary: 'First release.' }));

      const document = await aggregator.aggregate();

      expect(document.markdown).toBe(
        HEADER + '## 1.0.0\n\n**Release Date:** 2026-01-01\n\nFirst release.\n\n---\n'
      );
    });

    it('should render the placeholder when there are no records', async () => {
      const document = await aggregator.aggregate();

      expect(document).toEqual({
        versions: [],
        markdown: HEADER + 'No release notes available.\n',
        warnings: [],
      });
    });

    it('should warn about invalid records but still render them', async () => {
      store.setRecord('1.2.0', { version: '1.3.0', date: '2026-01-01', tag: '1.3.0' });

      const document = await aggregator.aggregate();

      expect(document.versions).toEqual(['1.2.0']);
      expect(document.markdown).toContain('## 1.3.0');
      expect(document.warnings).toEqual([
        '1.2.0.json: Version mismatch: file is 1.2.0.json but contains version 1.3.0',
        "1.2.0.json: Tag should start with 'v': 1.3.0",
      ]);
    });

    it('should skip unparseable records with a warning', async () => {
      store.setRecord('1.0.0', record('1.0.0'));
      store.setRawRecord('1.1.0', 'not json');

      const document = await aggregator.aggregate();

      expect(document.versions).toEqual(['1.0.0']);
      expect(document.warnings).toHaveLength(1);
      expect(document.warnings[0]).toMatch(/^Invalid JSON in 1\.1\.0\.json: /);
    });

    it('should add advisory schema findings as warnings', async () => {
      store.setSchema({ type: 'object', required: ['summary'] });
      store.setRecord('1.0.0', record('1.0.0'));

      const document = await aggregator.aggregate();

      expect(document.versions).toEqual(['1.0.0']);
      expect(document.warnings).toEqual(["1.0.0.json: schema: summary: must have required property 'summary'"]);
    });
  });

  describe('writeDocument', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relpack-notes-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should write the markdown under the given name, creating the directory', async () => {
      const outputDir = path.join(tempDir, 'dist');

      const written = await aggregator.writeDocument(
        { versions: [], markdown: '# tool Release Notes\n', warnings: [] },
        outputDir,
        'NOTES.md'
      );

      expect(written).toBe(path.join(outputDir, 'NOTES.md'));
      expect(fs.readFileSync(written, 'utf8')).toBe('# tool Release Notes\n');
      expect(fs.readdirSync(outputDir)).toEqual(['NOTES.md']);
    });

    it('should default to RELEASE-NOTES.md', async () => {
      const written = await aggregator.writeDocument({ versions: [], markdown: 'x', warnings: [] }, tempDir);

      expect(path.basename(written)).toBe('RELEASE-NOTES.md');
    });
  });

  describe('completeness', () => {
    beforeEach(() => {
      store.setRecord('1.1.0', record('1.1.0'));
    });

    it('checkCompleteness should list release tags without records, ignoring other tags', async () => {
      const missing = await aggregator.checkCompleteness(['v1.2.0', 'v1.1.0', 'v1.0.0', 'v1.0.0-SNAPSHOT', 'nightly', 'v1.0']);

      expect(missing).toEqual(['1.2.0', '1.0.0']);
    });

    it('listMissing should pair versions with their tags', async () => {
      expect(await aggregator.listMissing(['v1.2.0', 'v1.1.0'])).toEqual([{ version: '1.2.0', tag: 'v1.2.0' }]);
    });

    it('check should pass in warn-only mode while listing findings', async () => {
      const report = await aggregator.check({ knownTags: ['v1.2.0', 'v1.1.0'], mode: 'warn-only' });

      expect(report).toEqual({ mode: 'warn-only', passed: true, missing: ['1.2.0'], invalid: [] });
    });

    it('check should fail in strict mode with MissingRecordsError', async () => {
      const report = await aggregator.check({ knownTags: ['v1.2.0', 'v1.1.0'], mode: 'strict' });

      expect(report.passed).toBe(false);
      expect(report.error).toBeInstanceOf(MissingRecordsError);
      expect(report.error?.message).toBe('Missing release notes for 1 version(s): 1.2.0');
    });

    it('check should fail in strict mode on invalid records', async () => {
      store.setRecord('1.0.0', { version: '1.0.0', date: '2026-01-01' });

      const report = await aggregator.check({ knownTags: ['v1.1.0', 'v1.0.0'], mode: 'strict' });

      expect(report.passed).toBe(false);
      expect(report.invalid).toEqual([{
        version: '1.0.0',
        errors: [{ field: 'tag', message: 'Missing required field: tag', value: undefined }],
      }]);
      expect(report.error).toBeInstanceOf(RecordValidationError);
    });

    it('check should pass in strict mode when everything is present and valid', async () => {
      const report = await aggregator.check({ knownTags: ['v1.1.0'], mode: 'strict' });

      expect(report).toEqual({ mode: 'strict', passed: true, missing: [], invalid: [] });
    });
  });
});
