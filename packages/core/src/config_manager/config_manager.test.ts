import * as path from 'path';
import { ConfigManager, DEFAULT_BUILD_ARGS } from './config_manager';
import { MemoryConfigStore } from '../config_store/memory/memory_config_store';
import { ConfigValidationError } from '../errors';

const ROOT = path.resolve('/work/tool');

describe('ConfigManager', () => {
  let store: MemoryConfigStore;
  let manager: ConfigManager;

  beforeEach(() => {
    store = new MemoryConfigStore();
    manager = new ConfigManager(store, ROOT);
  });

  describe('loadConfig', () => {
    it('should return null without a config file', async () => {
      expect(await manager.loadConfig()).toBeNull();
    });

    it('should return a valid config unchanged', async () => {
      store.setConfig({ product: 'tool', injectionFailurePolicy: 'report-only' });

      expect(await manager.loadConfig()).toEqual({ product: 'tool', injectionFailurePolicy: 'report-only' });
    });

    it('should reject configs that do not match the schema', async () => {
      store.setConfig({ concurrency: 0, completeness: 'sometimes', surprise: true });

      const error = await manager.loadConfig().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toMatchObject({ code: 'CONFIG_VALIDATION_ERROR', configPath: 'memory://relpack.config.json' });
      const fields = error instanceof ConfigValidationError ? error.errors.map(e => e.field) : [];
      expect(fields).toEqual(expect.arrayContaining(['concurrency', 'completeness']));
    });

    it('should require {version} in version file replacements', async () => {
      store.setConfig({ versionFiles: [{ path: 'VERSION', pattern: '.*', replacement: 'fixed' }] });

      await expect(manager.loadConfig()).rejects.toBeInstanceOf(ConfigValidationError);
    });
  });

  describe('resolveConfig', () => {
    it('should apply every default', async () => {
      const config = await manager.resolveConfig();

      expect(config).toEqual({
        projectRoot: ROOT,
        product: 'tool',
        distDir: path.join(ROOT, 'dist'),
        platformsDir: path.join(ROOT, 'dist', 'platforms'),
        platformArchivesDir: path.join(ROOT, 'dist', 'platforms'),
        releaseNotesDir: path.join(ROOT, 'release-notes'),
        releaseNotesOutput: 'RELEASE-NOTES.md',
        build: {
          candidates: ['goreleaser', '~/go/bin/goreleaser'],
          args: DEFAULT_BUILD_ARGS,
          configFile: '.goreleaser.yml',
          timeoutMs: 1_800_000,
        },
        platformBuild: { command: 'make', args: ['build-all-platforms'], timeoutMs: 1_800_000 },
        versionFiles: [{
          path: 'build-with-version.sh',
          pattern: '^VERSION=\\$\\{1:-v[0-9]+\\.[0-9]+\\.[0-9]+\\}',
          replacement: 'VERSION=${1:-{version}}',
        }],
        versionFilesCommand: null,
        concurrency: 2,
        injectionFailurePolicy: 'fail-run',
        completeness: 'warn-only',
        git: { timeoutMs: 30_000 },
      });
    });

    it('should resolve configured directories against the project root', async () => {
      store.setConfig({
        product: 'widget',
        distDir: 'out',
        platformsDir: 'build/platforms',
        platformArchivesDir: 'out/platform-archives',
        releaseNotesDir: 'docs/notes',
      });

      const config = await manager.resolveConfig();

      expect(config.product).toBe('widget');
      expect(config.distDir).toBe(path.join(ROOT, 'out'));
      expect(config.platformsDir).toBe(path.join(ROOT, 'build', 'platforms'));
      expect(config.platformArchivesDir).toBe(path.join(ROOT, 'out', 'platform-archives'));
      expect(config.releaseNotesDir).toBe(path.join(ROOT, 'docs', 'notes'));
    });

    it.each(['.', '..', '/'])('should reject distDir %p because it contains the project root', async (distDir) => {
      store.setConfig({ distDir });

      const error = await manager.resolveConfig().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toMatchObject({ errors: [{ field: 'distDir', value: distDir }] });
    });

    it('should accept a distDir outside the project root', async () => {
      store.setConfig({ distDir: '../out' });

      expect((await manager.resolveConfig()).distDir).toBe(path.resolve(ROOT, '..', 'out'));
    });

    it('should let platformArchivesDir follow a custom platformsDir', async () => {
      store.setConfig({ platformsDir: 'bin' });

      const config = await manager.resolveConfig();

      expect(config.platformArchivesDir).toBe(path.join(ROOT, 'bin'));
    });

    it('should disable the platform build and the build config check on null', async () => {
      store.setConfig({ platformBuild: null, build: { configFile: null } });

      const config = await manager.resolveConfig();

      expect(config.platformBuild).toBeNull();
      expect(config.build.configFile).toBeNull();
    });

    it('should default args of a custom platform build to none', async () => {
      store.setConfig({ platformBuild: { command: './build-all.sh' } });

      expect((await manager.resolveConfig()).platformBuild).toEqual({
        command: './build-all.sh',
        args: [],
        timeoutMs: 1_800_000,
      });
    });
  });
});
