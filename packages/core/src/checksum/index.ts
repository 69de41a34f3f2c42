export {
  sha256File,
  checksumsFileName,
  formatChecksums,
  parseChecksums,
  writeChecksumsFile,
  verifyChecksumsFile,
} from './checksum';
export type { ChecksumEntry, ChecksumMismatch } from './checksum';
