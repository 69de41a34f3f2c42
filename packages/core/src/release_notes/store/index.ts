export type { ReleaseNotesStore, StoreReadResult } from './release_notes_store';
