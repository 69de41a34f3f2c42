export { MemoryReleaseNotesStore } from './memory_release_notes_store';
