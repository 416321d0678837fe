import { Router, Request, Response, RequestHandler } from 'express';
import multer from 'multer';
import type { CreateNoteResponse, ErrorResponse, SuccessResponse } from '@notebox/shared';
import { logger } from '../lib/logger.js';
import { status_for } from '../lib/errors.js';
import { actor_of } from '../middleware/auth.js';
import type { NoteService } from '../services/notes.js';
import type { AttachmentService } from '../services/attachments.js';
import {
  note_id_param_schema,
  create_note_schema,
  update_note_schema,
  toggle_pin_schema,
  delete_attachment_schema,
} from '../schemas/notes.js';

export interface NotesRouterDeps {
  notes: NoteService;
  attachments: AttachmentService;
  require_auth: RequestHandler;
  max_upload_bytes: number;
}

function send_error(req: Request, res: Response, operation: string, err: unknown): void {
  const status = status_for(err);
  const message = err instanceof Error ? err.message : String(err);

  if (status >= 500) {
    logger.error(`${operation} failed`, {
      request_id: req.request_id,
      error: message,
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn(`${operation} rejected`, { request_id: req.request_id, status, error: message });
  }

  res.status(status).json({ error: message, request_id: req.request_id } satisfies ErrorResponse);
}

export function create_notes_router(deps: NotesRouterDeps): Router {
  const { notes, attachments, require_auth } = deps;
  const router = Router();

  // Uploads are buffered in memory up to the configured limit
  const upload = multer({
    storage: multer.memoryStorage(),
    // Filenames arrive as UTF-8; multer defaults to latin1
    defParamCharset: 'utf8',
    limits: {
      fileSize: deps.max_upload_bytes,
      files: 1,
    },
  });

  // List notes with their attachments
  router.get('/notes', async (req, res) => {
    try {
      const result = await notes.list_notes();
      logger.debug('notes listed', { request_id: req.request_id, count: result.length });
      res.json(result);
    } catch (err) {
      send_error(req, res, 'notes/list', err);
    }
  });

  // Get one note
  router.get('/notes/:id', async (req, res) => {
    try {
      const param_result = note_id_param_schema.safeParse(req.params);
      if (!param_result.success) {
        logger.warn('notes/get validation failed', { request_id: req.request_id, issues: param_result.error.issues });
        res.status(400).json({ error: 'Invalid note ID', request_id: req.request_id });
        return;
      }

      const note = await notes.get_note(param_result.data.id);
      res.json(note);
    } catch (err) {
      send_error(req, res, 'notes/get', err);
    }
  });

  // Create note
  router.post('/notes', require_auth, async (req, res) => {
    try {
      const body_result = create_note_schema.safeParse(req.body);
      if (!body_result.success) {
        logger.warn('notes/create validation failed', { request_id: req.request_id, issues: body_result.error.issues });
        res.status(400).json({
          error: 'Invalid request body',
          details: body_result.error.issues,
          request_id: req.request_id,
        });
        return;
      }

      const id = await notes.create_note(body_result.data, actor_of(req));
      res.status(201).json({ id } satisfies CreateNoteResponse);
    } catch (err) {
      send_error(req, res, 'notes/create', err);
    }
  });

  // Update note
  router.put('/notes/:id', require_auth, async (req, res) => {
    try {
      const param_result = note_id_param_schema.safeParse(req.params);
      if (!param_result.success) {
        logger.warn('notes/update validation failed', { request_id: req.request_id, issues: param_result.error.issues });
        res.status(400).json({ error: 'Invalid note ID', request_id: req.request_id });
        return;
      }

      const body_result = update_note_schema.safeParse(req.body);
      if (!body_result.success) {
        logger.warn('notes/update body validation failed', { request_id: req.request_id, issues: body_result.error.issues });
        res.status(400).json({
          error: 'Invalid request body',
          details: body_result.error.issues,
          request_id: req.request_id,
        });
        return;
      }

      await notes.update_note(param_result.data.id, body_result.data, actor_of(req));
      res.json({ success: true } satisfies SuccessResponse);
    } catch (err) {
      send_error(req, res, 'notes/update', err);
    }
  });

  // Delete note, its attachment rows and (best effort) its stored objects
  router.delete('/notes/:id', require_auth, async (req, res) => {
    try {
      const param_result = note_id_param_schema.safeParse(req.params);
      if (!param_result.success) {
        logger.warn('notes/delete validation failed', { request_id: req.request_id, issues: param_result.error.issues });
        res.status(400).json({ error: 'Invalid note ID', request_id: req.request_id });
        return;
      }

      await notes.delete_note(param_result.data.id, actor_of(req));
      res.json({ success: true } satisfies SuccessResponse);
    } catch (err) {
      send_error(req, res, 'notes/delete', err);
    }
  });

  // Set pin flag
  router.put('/notes/:id/toggle-pin', require_auth, async (req, res) => {
    try {
      const param_result = note_id_param_schema.safeParse(req.params);
      if (!param_result.success) {
        logger.warn('notes/toggle_pin validation failed', { request_id: req.request_id, issues: param_result.error.issues });
        res.status(400).json({ error: 'Invalid note ID', request_id: req.request_id });
        return;
      }

      const body_result = toggle_pin_schema.safeParse(req.body);
      if (!body_result.success) {
        logger.warn('notes/toggle_pin body validation failed', { request_id: req.request_id, issues: body_result.error.issues });
        res.status(400).json({
          error: 'Invalid request body',
          details: body_result.error.issues,
          request_id: req.request_id,
        });
        return;
      }

      await notes.set_pinned(param_result.data.id, body_result.data.isPinned, actor_of(req));
      res.json({ success: true } satisfies SuccessResponse);
    } catch (err) {
      send_error(req, res, 'notes/toggle_pin', err);
    }
  });

  // Upload attachment
  router.post('/notes/:id/upload-file', require_auth, upload.single('file'), async (req, res) => {
    try {
      const param_result = note_id_param_schema.safeParse(req.params);
      if (!param_result.success) {
        logger.warn('notes/upload_file validation failed', { request_id: req.request_id, issues: param_result.error.issues });
        res.status(400).json({ error: 'Invalid note ID', request_id: req.request_id });
        return;
      }

      if (!req.file) {
        res.status(400).json({ error: 'No file uploaded', request_id: req.request_id });
        return;
      }

      const attachment = await attachments.upload(
        param_result.data.id,
        {
          originalname: req.file.originalname,
          mimetype: req.file.mimetype,
          buffer: req.file.buffer,
        },
        actor_of(req)
      );
      res.status(201).json(attachment);
    } catch (err) {
      send_error(req, res, 'notes/upload_file', err);
    }
  });

  // Delete attachment
  router.delete('/notes/:id/delete-file', require_auth, async (req, res) => {
    try {
      const param_result = note_id_param_schema.safeParse(req.params);
      if (!param_result.success) {
        logger.warn('notes/delete_file validation failed', { request_id: req.request_id, issues: param_result.error.issues });
        res.status(400).json({ error: 'Invalid note ID', request_id: req.request_id });
        return;
      }

      const body_result = delete_attachment_schema.safeParse(req.body);
      if (!body_result.success) {
        logger.warn('notes/delete_file body validation failed', { request_id: req.request_id, issues: body_result.error.issues });
        res.status(400).json({
          error: 'Invalid request body',
          details: body_result.error.issues,
          request_id: req.request_id,
        });
        return;
      }

      await attachments.delete(param_result.data.id, body_result.data.attachmentId, actor_of(req));
      res.json({ success: true } satisfies SuccessResponse);
    } catch (err) {
      send_error(req, res, 'notes/delete_file', err);
    }
  });

  return router;
}
