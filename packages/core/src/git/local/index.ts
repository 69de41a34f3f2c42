export { LocalGitModule } from './local_git_module';
