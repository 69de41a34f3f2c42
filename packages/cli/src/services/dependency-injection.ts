import { ReleaseNotes } from '@relpack/core';
import type { Config, Exec, Git, Pipeline } from '@relpack/core';
import {
  FsConfigStore,
  FsReleaseNotesStore,
  LocalGitModule,
  createConfigManager,
  createExecCommand,
  createReleasePipeline,
} from '@relpack/core/fs';

/**
 * Dependency Injection Service for the relpack CLI
 *
 * Creates and caches the core modules each command needs, all rooted at
 * the same project directory.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private projectRoot: string | null = null;
  private configManager: Config.IConfigManager | null = null;
  private releaseConfig: Config.ReleaseConfig | null = null;
  private execCommand: Exec.ExecCommand | null = null;
  private gitModule: Git.IGitModule | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the cached instance (tests)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Nearest directory with relpack.config.json or .git, else the cwd
   */
  getProjectRoot(): string {
    if (!this.projectRoot) {
      this.projectRoot = FsConfigStore.findProjectRoot() ?? process.cwd();
    }
    return this.projectRoot;
  }

  setProjectRoot(projectRoot: string): void {
    this.projectRoot = projectRoot;
    this.configManager = null;
    this.releaseConfig = null;
    this.execCommand = null;
    this.gitModule = null;
  }

  getConfigManager(): Config.IConfigManager {
    if (!this.configManager) {
      this.configManager = createConfigManager(this.getProjectRoot());
    }
    return this.configManager;
  }

  async getReleaseConfig(): Promise<Config.ReleaseConfig> {
    if (!this.releaseConfig) {
      this.releaseConfig = await this.getConfigManager().resolveConfig();
    }
    return this.releaseConfig;
  }

  getExecCommand(): Exec.ExecCommand {
    if (!this.execCommand) {
      this.execCommand = createExecCommand({ defaultCwd: this.getProjectRoot() });
    }
    return this.execCommand;
  }

  async getGitModule(): Promise<Git.IGitModule> {
    if (!this.gitModule) {
      const config = await this.getReleaseConfig();
      this.gitModule = new LocalGitModule({
        repoRoot: config.projectRoot,
        execCommand: this.getExecCommand(),
        timeout: config.git.timeoutMs,
      });
    }
    return this.gitModule;
  }

  async getReleaseNotesAggregator(): Promise<ReleaseNotes.ReleaseNotesAggregator> {
    const config = await this.getReleaseConfig();
    return new ReleaseNotes.ReleaseNotesAggregator({
      store: new FsReleaseNotesStore(config.releaseNotesDir),
      product: config.product,
    });
  }

  async getReleasePipeline(observer?: Pipeline.PipelineObserver): Promise<Pipeline.IReleasePipeline> {
    return createReleasePipeline({
      config: await this.getReleaseConfig(),
      execCommand: this.getExecCommand(),
      ...(observer ? { observer } : {}),
    });
  }
}
