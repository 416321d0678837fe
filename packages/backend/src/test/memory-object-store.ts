import { ObjectNotFoundError } from '../lib/errors.js';
import type { ObjectStore } from '../services/storage.js';

/** In-process ObjectStore; URLs are `memory://<bucket>/<key>?v=<n>`. */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Buffer>();
  bucket_created = false;
  private signatures = 0;

  constructor(readonly bucket = 'notes-files') {}

  async ensure_bucket(): Promise<void> {
    this.bucket_created = true;
  }

  async put(key: string, data: Buffer, _content_type: string): Promise<string> {
    await this.ensure_bucket();
    this.objects.set(key, Buffer.from(data));
    return this.presign(key);
  }

  async get(key: string): Promise<Buffer> {
    const data = this.objects.get(key);
    if (!data) {
      throw new ObjectNotFoundError(key);
    }
    return data;
  }

  async delete(key: string): Promise<void> {
    if (!this.objects.delete(key)) {
      throw new ObjectNotFoundError(key);
    }
  }

  async presign(key: string): Promise<string> {
    this.signatures++;
    return `memory://${this.bucket}/${encodeURIComponent(key)}?v=${this.signatures}`;
  }

  async ping(): Promise<void> {}
}
