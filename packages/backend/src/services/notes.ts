import type { Note } from '@notebox/shared';
import type { MissingNotePolicy } from '../config.js';
import type { NoteStore } from '../db/notes.js';
import { ForbiddenError, NotFoundError } from '../lib/errors.js';
import { logger as root_logger, type Logger } from '../lib/logger.js';
import type { CreateNoteInput, UpdateNoteInput } from '../schemas/notes.js';
import { check_note_access, type Actor } from './access.js';
import type { AttachmentService } from './attachments.js';

export interface NoteService {
  list_notes(): Promise<Note[]>;
  get_note(id: number): Promise<Note>;
  create_note(input: CreateNoteInput, actor?: Actor): Promise<number>;
  update_note(id: number, input: UpdateNoteInput, actor?: Actor): Promise<void>;
  set_pinned(id: number, is_pinned: boolean, actor?: Actor): Promise<void>;
  /**
   * Removes the note's stored objects (best effort), then its attachment rows
   * and the note row in one transaction.
   */
  delete_note(id: number, actor?: Actor): Promise<void>;
}

export interface NoteServiceDeps {
  store: NoteStore;
  attachments: AttachmentService;
  /** What update, pin toggle and delete do with an id that matches no note. */
  missing_note_policy: MissingNotePolicy;
  logger?: Logger;
}

export function create_note_service(deps: NoteServiceDeps): NoteService {
  const { store, attachments, missing_note_policy } = deps;
  const logger = (deps.logger ?? root_logger).child({ component: 'notes' });

  function on_missing(id: number, operation: string): void {
    if (missing_note_policy === 'reject') {
      throw new NotFoundError('Note not found');
    }
    logger.debug('note not found, ignoring', { note_id: id, operation });
  }

  // Only consulted when someone is authenticated; otherwise rowCount decides
  async function owned(id: number, actor: Actor): Promise<boolean> {
    return actor === null ? true : check_note_access(store, id, actor);
  }

  return {
    list_notes() {
      return store.list_notes();
    },

    async get_note(id) {
      const note = await store.get_note(id);
      if (!note) {
        throw new NotFoundError('Note not found');
      }
      return note;
    },

    async create_note(input, actor = null) {
      if (actor !== null && input.userId !== actor) {
        throw new ForbiddenError('userId does not match the authenticated user');
      }

      const id = await store.insert_note({
        user_id: input.userId,
        title: input.title,
        content: input.content,
        is_pinned: input.isPinned,
      });
      logger.info('note created', { note_id: id, user_id: input.userId });
      return id;
    },

    async update_note(id, input, actor = null) {
      const updated =
        (await owned(id, actor)) &&
        (await store.update_note(id, {
          title: input.title,
          content: input.content,
          is_pinned: input.isPinned,
        }));

      if (!updated) {
        on_missing(id, 'update');
        return;
      }
      logger.info('note updated', { note_id: id });
    },

    async set_pinned(id, is_pinned, actor = null) {
      const updated = (await owned(id, actor)) && (await store.set_pinned(id, is_pinned));
      if (!updated) {
        on_missing(id, 'toggle-pin');
        return;
      }
      logger.info('note pin toggled', { note_id: id, is_pinned });
    },

    async delete_note(id, actor = null) {
      if (missing_note_policy === 'reject' || actor !== null) {
        if (!(await check_note_access(store, id, actor))) {
          on_missing(id, 'delete');
          return;
        }
      }

      const objects = await attachments.remove_note_objects(id);
      const deleted = await store.delete_note(id);

      if (!deleted) {
        on_missing(id, 'delete');
        return;
      }
      logger.info('note deleted', {
        note_id: id,
        objects_removed: objects.removed,
        objects_failed: objects.failed,
      });
    },
  };
}
