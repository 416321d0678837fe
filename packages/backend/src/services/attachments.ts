import type { NoteAttachment } from '@notebox/shared';
import type { NoteStore } from '../db/notes.js';
import { ClientError, ConflictError, NotFoundError } from '../lib/errors.js';
import { logger as root_logger, error_meta, type Logger } from '../lib/logger.js';
import { check_note_access, type Actor } from './access.js';
import { object_key, split_file_name, type ObjectStore } from './storage.js';

export interface UploadedFile {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

export interface BulkDeleteResult {
  removed: number;
  failed: number;
}

export interface RefreshResult {
  refreshed: number;
  errors: number;
}

export interface AttachmentService {
  upload(note_id: number, file: UploadedFile, actor?: Actor): Promise<NoteAttachment>;
  delete(note_id: number, attachment_id: number, actor?: Actor): Promise<void>;
  /**
   * Best-effort removal of every stored object of a note. Failures are logged
   * and counted, never thrown.
   */
  remove_note_objects(note_id: number): Promise<BulkDeleteResult>;
  /** Re-signs the retrieval URL of every attachment. */
  refresh_urls(): Promise<RefreshResult>;
}

export interface AttachmentServiceDeps {
  store: NoteStore;
  object_store: ObjectStore;
  logger?: Logger;
}

function key_for(attachment: NoteAttachment): string {
  return object_key(attachment.noteId, attachment.fileName, attachment.extension);
}

export function create_attachment_service(deps: AttachmentServiceDeps): AttachmentService {
  const { store, object_store } = deps;
  const logger = (deps.logger ?? root_logger).child({ component: 'attachments' });
  // Object keys with an upload in progress; a second upload to the same key is refused
  const uploading = new Set<string>();

  return {
    async upload(note_id, file, actor = null) {
      if (!(await check_note_access(store, note_id, actor))) {
        throw new NotFoundError('Note not found');
      }

      const { file_name, extension } = split_file_name(file.originalname);
      if (!file_name) {
        throw new ClientError('File name is empty');
      }

      const key = object_key(note_id, file_name, extension);
      if (uploading.has(key)) {
        throw new ConflictError(`An upload of ${file.originalname} to this note is already in progress`);
      }
      uploading.add(key);

      try {
        const existing = await store.list_attachments(note_id);
        if (existing.some((a) => a.fileName === file_name && a.extension === extension)) {
          throw new ConflictError(`Note already has an attachment named ${file.originalname}`);
        }

        logger.info('uploading attachment', { note_id, key, size: file.buffer.length });

        // A failed upload aborts here, before any metadata is written
        const url = await object_store.put(key, file.buffer, file.mimetype);

        try {
          const attachment = await store.insert_attachment({
            note_id,
            file_name,
            extension,
            size: file.buffer.length,
            url,
          });
          logger.info('attachment saved', { note_id, attachment_id: attachment.id, key });
          return attachment;
        } catch (err) {
          logger.error('attachment metadata insert failed, object left in storage', {
            note_id,
            key,
            ...error_meta(err),
          });
          throw err;
        }
      } finally {
        uploading.delete(key);
      }
    },

    async delete(note_id, attachment_id, actor = null) {
      if (actor !== null && !(await check_note_access(store, note_id, actor))) {
        throw new NotFoundError('Note not found');
      }

      const attachment = await store.get_attachment(attachment_id, note_id);
      if (!attachment) {
        throw new NotFoundError('File not found');
      }

      const key = key_for(attachment);
      // Metadata stays in place when the object delete fails
      await object_store.delete(key);

      await store.delete_attachment(attachment_id, note_id);
      logger.info('attachment deleted', { note_id, attachment_id, key });
    },

    async remove_note_objects(note_id) {
      const attachments = await store.list_attachments(note_id);
      const result: BulkDeleteResult = { removed: 0, failed: 0 };

      for (const attachment of attachments) {
        const key = key_for(attachment);
        try {
          await object_store.delete(key);
          result.removed++;
        } catch (err) {
          result.failed++;
          logger.warn('failed to delete attachment object, continuing', {
            note_id,
            attachment_id: attachment.id,
            key,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }

      return result;
    },

    async refresh_urls() {
      const attachments = await store.list_all_attachments();
      const result: RefreshResult = { refreshed: 0, errors: 0 };

      for (const attachment of attachments) {
        try {
          const url = await object_store.presign(key_for(attachment));
          if (await store.update_attachment_url(attachment.id, url)) {
            result.refreshed++;
          }
        } catch (err) {
          result.errors++;
          logger.error('failed to refresh attachment url', {
            attachment_id: attachment.id,
            ...error_meta(err),
          });
        }
      }

      return result;
    },
  };
}
