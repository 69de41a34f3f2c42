export {
  openArchive,
  getCodec,
  createArchiveFromDirectory,
  extractArchive,
  listArchiveMembers,
} from './archive';
export { zipCodec } from './zip_codec';
export { tarGzCodec } from './tar_codec';
export type { Archive, ArchiveCodec } from './archive.types';
