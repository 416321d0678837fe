import { create_app } from './app.js';
import { config, type Config } from './config.js';
import { logger } from './lib/logger.js';
import { create_database, create_pool } from './db/index.js';
import { run_migrations } from './db/migrate.js';
import { create_note_store } from './db/notes.js';
import { LocalObjectStore, type ObjectStore } from './services/storage.js';
import { S3ObjectStore, create_s3_client } from './services/s3-storage.js';
import { create_attachment_service } from './services/attachments.js';
import { create_note_service } from './services/notes.js';
import { create_url_refresh_job } from './jobs/url-refresh.js';

function create_object_store(cfg: Config): ObjectStore {
  if (cfg.local) {
    return new LocalObjectStore({
      root: cfg.local.storage_path,
      bucket: cfg.storage_bucket,
      public_url: cfg.local.public_url,
      secret: cfg.local.file_url_secret,
      url_ttl_seconds: cfg.file_url_ttl_seconds,
    });
  }
  if (cfg.s3) {
    return new S3ObjectStore(create_s3_client(cfg.s3), cfg.storage_bucket, cfg.file_url_ttl_seconds);
  }
  throw new Error(`No settings for storage type ${cfg.storage_type}`);
}

async function main(): Promise<void> {
  const pool = create_pool(config.database_url);

  // Run migrations before starting the server
  await run_migrations(pool);

  const database = create_database(pool);
  const store = create_note_store(database);
  const object_store = create_object_store(config);
  const attachments = create_attachment_service({ store, object_store });
  const notes = create_note_service({
    store,
    attachments,
    missing_note_policy: config.missing_note_policy,
  });
  const url_refresh = create_url_refresh_job(attachments, config.url_refresh_cron);

  const app = create_app({ database, object_store, notes, attachments });

  const server = app.listen(config.port, () => {
    logger.info('server started', {
      port: config.port,
      node_env: config.node_env,
      storage_type: config.storage_type,
      bucket: config.storage_bucket,
    });

    url_refresh.start();
  });

  server.requestTimeout = config.read_timeout_ms;
  server.headersTimeout = Math.min(config.read_timeout_ms, 60_000);
  server.keepAliveTimeout = config.idle_timeout_ms;
  server.setTimeout(config.write_timeout_ms);

  function shutdown(): void {
    logger.info('shutting down');
    url_refresh.stop();
    server.close(() => {
      database
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('pool close failed', { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  }

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  logger.error('startup failed', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
