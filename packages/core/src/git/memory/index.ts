export { MemoryGitModule } from './memory_git_module';
export type { MemoryTag } from './memory_git_module';
