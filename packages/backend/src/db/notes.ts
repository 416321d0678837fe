import type { Note, NoteAttachment } from '@notebox/shared';
import type { Database } from './index.js';
import { ConflictError } from '../lib/errors.js';

export interface NoteRow {
  id: number;
  // BIGINT arrives as a string from pg
  user_id: string;
  title: string;
  content: string;
  last_modified: Date;
  is_pin: boolean;
}

export interface AttachmentRow {
  id: number;
  note_id: number;
  file_name: string;
  ext: string;
  size: string;
  file_url: string;
}

export interface NewNote {
  user_id: number;
  title: string;
  content: string;
  is_pinned: boolean;
}

export interface NoteChanges {
  title: string;
  content: string;
  is_pinned: boolean;
}

export interface NewAttachment {
  note_id: number;
  file_name: string;
  extension: string;
  size: number;
  url: string;
}

/**
 * Durable storage for notes and their attachment metadata. Methods that
 * target a single row report whether a row matched instead of throwing, so
 * callers decide what a missing row means.
 */
export interface NoteStore {
  list_notes(): Promise<Note[]>;
  get_note(id: number): Promise<Note | null>;
  /** Owning user id, or null when no note has this id. */
  get_note_owner(id: number): Promise<number | null>;
  insert_note(input: NewNote): Promise<number>;
  update_note(id: number, changes: NoteChanges): Promise<boolean>;
  set_pinned(id: number, is_pinned: boolean): Promise<boolean>;
  /** Removes the note's attachment rows and then the note, atomically. */
  delete_note(id: number): Promise<boolean>;
  insert_attachment(input: NewAttachment): Promise<NoteAttachment>;
  list_attachments(note_id: number): Promise<NoteAttachment[]>;
  list_all_attachments(): Promise<NoteAttachment[]>;
  get_attachment(id: number, note_id: number): Promise<NoteAttachment | null>;
  delete_attachment(id: number, note_id: number): Promise<boolean>;
  update_attachment_url(id: number, url: string): Promise<boolean>;
}

const NOTE_COLUMNS = 'id, user_id, title, content, last_modified, is_pin';
const ATTACHMENT_COLUMNS = 'id, note_id, file_name, ext, size, file_url';

const UNIQUE_VIOLATION = '23505';

function is_unique_violation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

function display_name(input: NewAttachment): string {
  return input.extension ? `${input.file_name}.${input.extension}` : input.file_name;
}

export function to_attachment(row: AttachmentRow): NoteAttachment {
  return {
    id: row.id,
    noteId: row.note_id,
    fileName: row.file_name,
    extension: row.ext,
    size: Number(row.size),
    url: row.file_url,
  };
}

export function to_note(row: NoteRow, attachments: NoteAttachment[]): Note {
  return {
    id: row.id,
    userId: Number(row.user_id),
    title: row.title,
    content: row.content,
    lastModified: row.last_modified,
    isPinned: row.is_pin,
    attachments,
  };
}

export function create_note_store(db: Database): NoteStore {
  async function list_attachments(note_id: number): Promise<NoteAttachment[]> {
    const result = await db.query<AttachmentRow>(
      `SELECT ${ATTACHMENT_COLUMNS} FROM note_files WHERE note_id = $1 ORDER BY id`,
      [note_id]
    );
    return result.rows.map(to_attachment);
  }

  return {
    async list_notes() {
      const notes = await db.query<NoteRow>(`SELECT ${NOTE_COLUMNS} FROM notes ORDER BY id`);
      if (notes.rows.length === 0) {
        return [];
      }

      const ids = notes.rows.map((row) => row.id);
      const files = await db.query<AttachmentRow>(
        `SELECT ${ATTACHMENT_COLUMNS} FROM note_files WHERE note_id = ANY($1::int[]) ORDER BY id`,
        [ids]
      );

      const by_note = new Map<number, NoteAttachment[]>();
      for (const row of files.rows) {
        const list = by_note.get(row.note_id) ?? [];
        list.push(to_attachment(row));
        by_note.set(row.note_id, list);
      }

      return notes.rows.map((row) => to_note(row, by_note.get(row.id) ?? []));
    },

    async get_note(id) {
      const result = await db.query<NoteRow>(`SELECT ${NOTE_COLUMNS} FROM notes WHERE id = $1`, [id]);
      const row = result.rows[0];
      if (!row) {
        return null;
      }
      return to_note(row, await list_attachments(id));
    },

    async get_note_owner(id) {
      const result = await db.query<{ user_id: string }>('SELECT user_id FROM notes WHERE id = $1', [id]);
      const row = result.rows[0];
      return row ? Number(row.user_id) : null;
    },

    async insert_note(input) {
      const result = await db.query<{ id: number }>(
        `INSERT INTO notes (user_id, title, content, last_modified, is_pin)
         VALUES ($1, $2, $3, NOW(), $4)
         RETURNING id`,
        [input.user_id, input.title, input.content, input.is_pinned]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('Insert into notes returned no id');
      }
      return row.id;
    },

    async update_note(id, changes) {
      const result = await db.query(
        `UPDATE notes SET title = $1, content = $2, last_modified = NOW(), is_pin = $3
         WHERE id = $4`,
        [changes.title, changes.content, changes.is_pinned, id]
      );
      return (result.rowCount ?? 0) > 0;
    },

    async set_pinned(id, is_pinned) {
      const result = await db.query('UPDATE notes SET is_pin = $1 WHERE id = $2', [is_pinned, id]);
      return (result.rowCount ?? 0) > 0;
    },

    async delete_note(id) {
      return db.transaction(async (client) => {
        await client.query('DELETE FROM note_files WHERE note_id = $1', [id]);
        const result = await client.query('DELETE FROM notes WHERE id = $1', [id]);
        return (result.rowCount ?? 0) > 0;
      });
    },

    async insert_attachment(input) {
      const result = await db
        .query<AttachmentRow>(
          `INSERT INTO note_files (note_id, file_name, size, ext, file_url)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${ATTACHMENT_COLUMNS}`,
          [input.note_id, input.file_name, input.size, input.extension, input.url]
        )
        .catch((err: unknown) => {
          if (is_unique_violation(err)) {
            throw new ConflictError(`Note already has an attachment named ${display_name(input)}`);
          }
          throw err;
        });
      const row = result.rows[0];
      if (!row) {
        throw new Error('Insert into note_files returned no row');
      }
      return to_attachment(row);
    },

    list_attachments,

    async list_all_attachments() {
      const result = await db.query<AttachmentRow>(`SELECT ${ATTACHMENT_COLUMNS} FROM note_files ORDER BY id`);
      return result.rows.map(to_attachment);
    },

    async get_attachment(id, note_id) {
      const result = await db.query<AttachmentRow>(
        `SELECT ${ATTACHMENT_COLUMNS} FROM note_files WHERE id = $1 AND note_id = $2`,
        [id, note_id]
      );
      const row = result.rows[0];
      return row ? to_attachment(row) : null;
    },

    async delete_attachment(id, note_id) {
      const result = await db.query('DELETE FROM note_files WHERE id = $1 AND note_id = $2', [id, note_id]);
      return (result.rowCount ?? 0) > 0;
    },

    async update_attachment_url(id, url) {
      const result = await db.query('UPDATE note_files SET file_url = $1 WHERE id = $2', [url, id]);
      return (result.rowCount ?? 0) > 0;
    },
  };
}
