export { FsReleaseNotesStore, SCHEMA_FILE_NAME } from './fs_release_notes_store';
