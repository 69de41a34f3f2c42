const mockDependencyService = {
  getReleaseConfig: jest.fn(),
  getReleaseNotesAggregator: jest.fn(),
  getGitModule: jest.fn(),
};

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: () => mockDependencyService
  }
}));

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Config, ReleaseNotes } from '@relpack/core';
import { MemoryConfigStore, MemoryGitModule, MemoryReleaseNotesStore } from '@relpack/core/memory';
import { NotesCommand } from './notes-command';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

function stdout(): string[] {
  return mockConsoleLog.mock.calls.map(call => String(call[0]));
}

function stderr(): string[] {
  return mockConsoleError.mock.calls.map(call => String(call[0]));
}

describe('NotesCommand', () => {
  let projectRoot: string;
  let store: MemoryReleaseNotesStore;
  let git: MemoryGitModule;
  let notesCommand: NotesCommand;

  async function useConfig(overrides: Config.ProjectConfigFile = {}): Promise<void> {
    const configStore = new MemoryConfigStore();
    configStore.setConfig({ product: 'demo', ...overrides });
    mockDependencyService.getReleaseConfig.mockResolvedValue(
      await new Config.ConfigManager(configStore, projectRoot).resolveConfig()
    );
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'relpack-cli-notes-'));
    store = new MemoryReleaseNotesStore();
    git = new MemoryGitModule(projectRoot);

    await useConfig();
    mockDependencyService.getReleaseNotesAggregator.mockResolvedValue(new ReleaseNotes.ReleaseNotesAggregator({
      store,
      product: 'demo',
      now: () => new Date('2026-03-01T12:00:00Z'),
    }));
    mockDependencyService.getGitModule.mockResolvedValue(git);
    notesCommand = new NotesCommand();
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  afterAll(() => {
    mockConsoleLog.mockRestore();
    mockConsoleError.mockRestore();
    mockProcessExit.mockRestore();
  });

  describe('executeGenerate', () => {
    beforeEach(() => {
      store.setRecord('1.0.0', { version: '1.0.0', date: '2026-01-10', tag: 'v1.0.0', summary: 'First release.' });
      store.setRecord('1.1.0', { version: '1.1.0', date: '2026-02-10', tag: 'v1.1.0', summary: 'Second release.' });
    });

    it('should write every version, newest first, to the project root', async () => {
      await notesCommand.executeGenerate({ color: false });

      const target = path.join(projectRoot, 'RELEASE-NOTES.md');
      const markdown = fs.readFileSync(target, 'utf8');
      expect(markdown.startsWith('# demo Release Notes\n')).toBe(true);
      expect(markdown.indexOf('## 1.1.0')).toBeLessThan(markdown.indexOf('## 1.0.0'));
      expect(stdout()).toEqual([`✓ Generated: ${target} (2 version(s))`]);
    });

    it('should restrict to one version and honour output and filename', async () => {
      const outputDir = path.join(projectRoot, 'out');
      fs.mkdirSync(outputDir);

      await notesCommand.executeGenerate({ version: 'v1.0.0', output: outputDir, filename: 'NOTES.md', json: true });

      const output = JSON.parse(stdout()[0] ?? '');
      expect(output.data).toEqual({ path: path.join(outputDir, 'NOTES.md'), versions: ['1.0.0'], warnings: [] });
      expect(fs.readFileSync(path.join(outputDir, 'NOTES.md'), 'utf8')).not.toContain('## 1.1.0');
    });

    it('should warn when the requested version has no record', async () => {
      await notesCommand.executeGenerate({ version: 'v9.9.9', color: false });

      expect(stderr()).toEqual(['! No release notes for 9.9.9']);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });
  });

  describe('executeCheck', () => {
    beforeEach(() => {
      git.setTags(['v1.0.0', 'v1.1.0', 'v1.2.0', 'nightly']);
      store.setRecord('1.0.0', { version: '1.0.0', date: '2026-01-10', tag: 'v1.0.0' });
    });

    it('should list missing versions newest first and pass in warn-only mode', async () => {
      await notesCommand.executeCheck({ color: false });

      expect(stderr()).toEqual([
        '! Warning: Missing release notes for 2 version(s):',
        '!   - 1.2.0 (tag: v1.2.0)',
        '!   - 1.1.0 (tag: v1.1.0)',
      ]);
      expect(stdout()).toEqual(['✓ Release notes check passed with warnings']);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should exit 1 with --strict', async () => {
      await notesCommand.executeCheck({ strict: true, color: false });

      expect(stderr()[0]).toBe('! Error: Missing release notes for 2 version(s):');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should follow the configured mode when no flag is given', async () => {
      await useConfig({ completeness: 'strict' });

      await notesCommand.executeCheck({ json: true });

      const output = JSON.parse(stdout()[0] ?? '');
      expect(output.success).toBe(false);
      expect(output.data.missing).toEqual(['1.2.0', '1.1.0']);
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should let --warn-only override a strict configuration', async () => {
      await useConfig({ completeness: 'strict' });

      await notesCommand.executeCheck({ warnOnly: true, color: false });

      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should report invalid records', async () => {
      git.setTags(['v1.0.0']);
      store.setRecord('1.0.0', { version: '1.0.0', date: '2026-01-10', tag: '1.0.0' });

      await notesCommand.executeCheck({ strict: true, color: false });

      expect(stderr()[0]).toBe('! Error: Invalid release notes for 1 version(s):');
      expect(stderr()[1]).toMatch(/^! {3}- 1\.0\.0: tag: /);
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should pass cleanly when every tag has a record', async () => {
      git.setTags(['v1.0.0']);

      await notesCommand.executeCheck({ strict: true, color: false });

      expect(stdout()).toEqual(['✓ All release tags have valid release notes']);
    });
  });

  describe('executeListMissing', () => {
    it('should print tags without a record', async () => {
      git.setTags(['v1.0.0', 'v2.0.0']);
      store.setRecord('1.0.0', { version: '1.0.0', date: '2026-01-10', tag: 'v1.0.0' });

      await notesCommand.executeListMissing({ color: false });

      expect(stdout()).toEqual(['Versions without release notes JSON:', '  2.0.0']);
    });

    it('should say so when nothing is missing', async () => {
      await notesCommand.executeListMissing({ color: false });

      expect(stdout()).toEqual(['Versions without release notes JSON:', '  (none - all versions have JSON files)']);
    });

    it('should return the missing entries as JSON', async () => {
      git.setTags(['v3.0.0']);

      await notesCommand.executeListMissing({ json: true });

      expect(JSON.parse(stdout()[0] ?? '')).toEqual({ success: true, data: [{ tag: 'v3.0.0', version: '3.0.0' }] });
    });
  });
});
