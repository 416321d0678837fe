import express from 'express';
import cors from 'cors';
import { config } from './config.js';
import type { Queryable } from './db/index.js';
import { logging_middleware } from './middleware/logging.js';
import { error_middleware, not_found_middleware } from './middleware/error.js';
import { create_auth_middleware } from './middleware/auth.js';
import { create_health_router } from './routes/health.js';
import { create_notes_router } from './routes/notes.js';
import { create_files_router } from './routes/files.js';
import { LocalObjectStore, type ObjectStore } from './services/storage.js';
import type { NoteService } from './services/notes.js';
import type { AttachmentService } from './services/attachments.js';

/** Process-wide handles built once at start-up. */
export interface AppDeps {
  database: Queryable;
  object_store: ObjectStore;
  notes: NoteService;
  attachments: AttachmentService;
}

export function create_app(deps: AppDeps): express.Application {
  const app = express();

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      optionsSuccessStatus: 200,
    })
  );
  app.use(express.json());
  app.use(logging_middleware);

  // Public routes
  app.use(create_health_router(deps.database, deps.object_store));

  // Signed download links of the filesystem store
  if (deps.object_store instanceof LocalObjectStore) {
    app.use(create_files_router(deps.object_store));
  }

  // Note routes
  app.use(
    create_notes_router({
      notes: deps.notes,
      attachments: deps.attachments,
      require_auth: create_auth_middleware({
        required: config.auth_required,
        bot_token: config.bot_token,
        max_age_seconds: config.auth_max_age_seconds,
      }),
      max_upload_bytes: config.max_upload_bytes,
    })
  );

  // Frontend build, when one is deployed alongside
  if (config.static_dir) {
    app.use(express.static(config.static_dir));
  }

  app.use(not_found_middleware);
  app.use(error_middleware);

  return app;
}
