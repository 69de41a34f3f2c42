export {
  validateVersion,
  isValidVersion,
  toNumeric,
  toTag,
  parseVersionNumber,
  compareVersionNumbers,
  isReleaseTag,
} from './version';
export type { Version, VersionParts } from './version';
