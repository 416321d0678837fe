import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../lib/logger.js';
import type { AttachmentService } from '../services/attachments.js';

// ── Types ──────────────────────────────────────────────────────────────────

export interface UrlRefreshResult {
  skipped?: boolean;
  refreshed: number;
  errors: number;
  duration_ms: number;
}

export interface UrlRefreshJob {
  run(): Promise<UrlRefreshResult>;
  start(): void;
  stop(): void;
  is_running(): boolean;
}

function empty_result(): UrlRefreshResult {
  return { refreshed: 0, errors: 0, duration_ms: 0 };
}

/**
 * Re-signs stored retrieval URLs on a cron schedule so links handed out with
 * notes keep working past their expiry window. An empty schedule disables it.
 */
export function create_url_refresh_job(attachments: AttachmentService, schedule: string): UrlRefreshJob {
  // ── Mutex ──────────────────────────────────────────────────────────────
  let running = false;
  let cron_task: ScheduledTask | null = null;

  async function run(): Promise<UrlRefreshResult> {
    if (running) {
      logger.info('URL refresh already running, skipping');
      return { ...empty_result(), skipped: true };
    }

    running = true;
    const start = Date.now();
    const result = empty_result();

    try {
      const counts = await attachments.refresh_urls();
      result.refreshed = counts.refreshed;
      result.errors = counts.errors;
      return result;
    } catch (error) {
      logger.error('URL refresh failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      result.errors++;
      return result;
    } finally {
      result.duration_ms = Date.now() - start;
      running = false;

      logger.info('URL refresh completed', {
        refreshed: result.refreshed,
        errors: result.errors,
        duration_ms: result.duration_ms,
      });
    }
  }

  // ── Cron scheduling ────────────────────────────────────────────────────

  function start(): void {
    if (!schedule) {
      logger.info('URL refresh cron disabled');
      return;
    }

    if (cron_task) {
      logger.warn('URL refresh cron already started');
      return;
    }

    if (!cron.validate(schedule)) {
      logger.error('Invalid URL refresh cron schedule', { schedule });
      return;
    }

    cron_task = cron.schedule(schedule, () => {
      run().catch((error: unknown) => {
        logger.error('URL refresh cron run failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
    });

    logger.info('URL refresh cron started', { schedule });
  }

  function stop(): void {
    if (cron_task) {
      cron_task.stop();
      cron_task = null;
      logger.info('URL refresh cron stopped');
    }
  }

  return { run, start, stop, is_running: () => running };
}
