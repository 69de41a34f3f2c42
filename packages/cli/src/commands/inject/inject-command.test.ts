const mockDependencyService = {
  getReleaseConfig: jest.fn(),
};

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: () => mockDependencyService
  }
}));

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Archive, Config } from '@relpack/core';
import { MemoryConfigStore } from '@relpack/core/memory';
import { InjectCommand } from './inject-command';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('InjectCommand', () => {
  let projectRoot: string;
  let distDir: string;
  let injectCommand: InjectCommand;

  async function useConfig(overrides: Config.ProjectConfigFile = {}): Promise<void> {
    const store = new MemoryConfigStore();
    store.setConfig({ product: 'demo', ...overrides });
    mockDependencyService.getReleaseConfig.mockResolvedValue(
      await new Config.ConfigManager(store, projectRoot).resolveConfig()
    );
  }

  async function makeArchive(sourceName: string, fileName: string, format: 'zip' | 'tar.gz', outputDir: string): Promise<void> {
    const sourceDir = path.join(projectRoot, 'src-trees', sourceName);
    fs.mkdirSync(sourceDir, { recursive: true });
    fs.writeFileSync(path.join(sourceDir, 'README.md'), `# ${sourceName}\n`);
    await Archive.createArchiveFromDirectory(sourceDir, path.join(outputDir, fileName), format);
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'relpack-cli-inject-'));
    distDir = path.join(projectRoot, 'dist');
    fs.mkdirSync(path.join(distDir, 'platforms'), { recursive: true });
    await useConfig();
    injectCommand = new InjectCommand();
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  afterAll(() => {
    mockConsoleLog.mockRestore();
    mockConsoleError.mockRestore();
    mockProcessExit.mockRestore();
  });

  it('should inject platform archives into every release archive', async () => {
    await makeArchive('linux', 'linux-amd64.tar.gz', 'tar.gz', path.join(distDir, 'platforms'));
    await makeArchive('release-linux', 'demo_1.0.0_linux_amd64.tar.gz', 'tar.gz', distDir);
    await makeArchive('release-windows', 'demo_1.0.0_windows_amd64.zip', 'zip', distDir);

    await injectCommand.executeInject({ color: false });

    const members = await Archive.listArchiveMembers(Archive.openArchive(path.join(distDir, 'demo_1.0.0_windows_amd64.zip')));
    expect(members).toContain('platforms/linux-amd64.tar.gz');
    expect(mockConsoleLog).toHaveBeenLastCalledWith('✓ Injected 1 platform archive(s) into 2 release archive(s)');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should succeed with a warning when there is nothing to inject', async () => {
    await makeArchive('release-linux', 'demo_1.0.0_linux_amd64.tar.gz', 'tar.gz', distDir);

    await injectCommand.executeInject({ color: false });

    expect(mockConsoleError).toHaveBeenCalledWith('! Injection skipped: no platform archives');
    expect(mockConsoleLog).toHaveBeenLastCalledWith('✓ Nothing injected');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should exit 1 when the dist directory has no release archives', async () => {
    await injectCommand.executeInject({ color: false });

    expect(mockConsoleError).toHaveBeenCalledWith(
      `✗ No release archives (demo_*.tar.gz, demo_*.zip) found in ${distDir}`
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  describe('failure policy', () => {
    beforeEach(async () => {
      await makeArchive('linux', 'linux-amd64.tar.gz', 'tar.gz', path.join(distDir, 'platforms'));
      await makeArchive('release-linux', 'demo_1.0.0_linux_amd64.tar.gz', 'tar.gz', distDir);
      fs.writeFileSync(path.join(distDir, 'demo_1.0.0_darwin_amd64.zip'), 'not a zip file');
    });

    it('should exit 1 under fail-run', async () => {
      await injectCommand.executeInject({ json: true });

      const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(output.success).toBe(false);
      expect(output.error).toBe('Injection failed for 1 of 2 archive(s)');
      expect(output.data.injected).toEqual(['demo_1.0.0_linux_amd64.tar.gz']);
      expect(output.data.failed[0].archive).toBe('demo_1.0.0_darwin_amd64.zip');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should report failures and exit 0 under report-only', async () => {
      await useConfig({ injectionFailurePolicy: 'report-only' });

      await injectCommand.executeInject({ color: false });

      const errors = mockConsoleError.mock.calls.map(call => String(call[0]));
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^✗ demo_1\.0\.0_darwin_amd64\.zip: Failed to extract archive /);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });
  });
});
