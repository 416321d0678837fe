import crypto from 'crypto';
import { mkdir, readFile, stat, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { ObjectNotFoundError, ObjectStillPresentError } from '../lib/errors.js';
import { constant_time_compare } from '../lib/auth.js';
import { logger } from '../lib/logger.js';

/**
 * Blob persistence behind a key in a single bucket. The bucket is created on
 * first use.
 */
export interface ObjectStore {
  readonly bucket: string;
  ensure_bucket(): Promise<void>;
  /** Stores `data` under `key` and returns a time-limited retrieval URL. */
  put(key: string, data: Buffer, content_type: string): Promise<string>;
  get(key: string): Promise<Buffer>;
  /**
   * Throws ObjectNotFoundError when the object is absent beforehand and
   * ObjectStillPresentError when it can still be found afterwards.
   */
  delete(key: string): Promise<void>;
  presign(key: string): Promise<string>;
  ping(): Promise<void>;
}

export interface FileNameParts {
  file_name: string;
  extension: string;
}

/**
 * Splits an uploaded file name into base name and extension at the last dot
 * of the base name. Directory parts sent by the client are dropped.
 */
export function split_file_name(original: string): FileNameParts {
  const base = path.posix.basename(original.replace(/\\/g, '/'));
  const ext = path.posix.extname(base);
  if (!ext) {
    return { file_name: base, extension: '' };
  }
  return { file_name: base.slice(0, -ext.length), extension: ext.slice(1) };
}

/** The only place object keys are derived; upload and delete both go through it. */
export function object_key(note_id: number, file_name: string, extension: string): string {
  return extension ? `${note_id}-${file_name}.${extension}` : `${note_id}-${file_name}`;
}

/**
 * Memoizes bucket provisioning; a failed attempt is forgotten so the next
 * caller tries again.
 */
export function once_until_failure(fn: () => Promise<void>): () => Promise<void> {
  let pending: Promise<void> | null = null;
  return () => {
    if (!pending) {
      pending = fn().catch((err: unknown) => {
        pending = null;
        throw err;
      });
    }
    return pending;
  };
}

// ── Local filesystem store ─────────────────────────────────────────────────

export interface LocalObjectStoreOptions {
  root: string;
  bucket: string;
  public_url: string;
  secret: string;
  url_ttl_seconds: number;
  now?: () => Date;
}

export interface SignedFileQuery {
  expires: number;
  signature: string;
}

function is_missing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Keeps objects as files under `<root>/<bucket>/` and hands out HMAC-signed
 * links to the app's `/files/:key` route.
 */
export class LocalObjectStore implements ObjectStore {
  readonly bucket: string;
  private readonly bucket_dir: string;
  private readonly now: () => Date;
  readonly ensure_bucket: () => Promise<void>;

  constructor(private readonly options: LocalObjectStoreOptions) {
    this.bucket = options.bucket;
    this.bucket_dir = path.resolve(options.root, options.bucket);
    this.now = options.now ?? (() => new Date());
    this.ensure_bucket = once_until_failure(async () => {
      await mkdir(this.bucket_dir, { recursive: true });
      logger.debug('local bucket ready', { bucket: this.bucket, path: this.bucket_dir });
    });
  }

  private file_path(key: string): string {
    const full = path.resolve(this.bucket_dir, key);
    if (path.dirname(full) !== this.bucket_dir) {
      throw new Error(`Invalid object key: ${key}`);
    }
    return full;
  }

  private sign(key: string, expires: number): string {
    return crypto.createHmac('sha256', this.options.secret).update(`${key}\n${expires}`).digest('hex');
  }

  async put(key: string, data: Buffer, _content_type: string): Promise<string> {
    await this.ensure_bucket();
    logger.debug('storing object', { bucket: this.bucket, key, size: data.length });
    await writeFile(this.file_path(key), data);
    return this.presign(key);
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await readFile(this.file_path(key));
    } catch (err) {
      if (is_missing(err)) {
        throw new ObjectNotFoundError(key, { cause: err });
      }
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await stat(this.file_path(key));
      return true;
    } catch (err) {
      if (is_missing(err)) {
        return false;
      }
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    logger.debug('deleting object', { bucket: this.bucket, key });
    if (!(await this.exists(key))) {
      throw new ObjectNotFoundError(key);
    }

    await unlink(this.file_path(key));

    if (await this.exists(key)) {
      throw new ObjectStillPresentError(key);
    }
  }

  async presign(key: string): Promise<string> {
    const expires = Math.floor(this.now().getTime() / 1000) + this.options.url_ttl_seconds;
    const base = this.options.public_url.replace(/\/+$/, '');
    const query = new URLSearchParams({ expires: String(expires), signature: this.sign(key, expires) });
    return `${base}/files/${encodeURIComponent(key)}?${query.toString()}`;
  }

  /** Checks a link produced by `presign`; false when expired or tampered with. */
  verify(key: string, query: SignedFileQuery): boolean {
    if (query.expires < Math.floor(this.now().getTime() / 1000)) {
      return false;
    }
    return constant_time_compare(query.signature, this.sign(key, query.expires));
  }

  async ping(): Promise<void> {
    await this.ensure_bucket();
    await stat(this.bucket_dir);
  }
}
