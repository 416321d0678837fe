export type * from './types/note.js';
export type * from './types/api.js';
