export { PostgresTranscriptStore, createPostgresTranscriptStore } from './transcripts.js';
export type { QueryClient } from './transcripts.js';
