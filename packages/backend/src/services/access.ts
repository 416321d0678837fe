import type { NoteStore } from '../db/notes.js';
import { ForbiddenError } from '../lib/errors.js';

/** Authenticated user id, or null when requests are not authenticated. */
export type Actor = number | null;

/**
 * Resolves whether the note exists and, when an actor is known, that the actor
 * owns it. Returns false for a missing note.
 */
export async function check_note_access(store: NoteStore, note_id: number, actor: Actor): Promise<boolean> {
  const owner = await store.get_note_owner(note_id);
  if (owner === null) {
    return false;
  }
  if (actor !== null && owner !== actor) {
    throw new ForbiddenError('Note belongs to another user');
  }
  return true;
}
