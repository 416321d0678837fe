import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { S3Settings } from '../config.js';
import { ObjectNotFoundError, ObjectStillPresentError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { once_until_failure, type ObjectStore } from './storage.js';

export function create_s3_client(settings: S3Settings): S3Client {
  return new S3Client({
    endpoint: settings.endpoint,
    region: settings.region,
    forcePathStyle: settings.force_path_style,
    credentials: {
      accessKeyId: settings.access_key,
      secretAccessKey: settings.secret_key,
    },
  });
}

export function is_not_found(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) {
    return false;
  }
  return (
    err.name === 'NotFound' ||
    err.name === 'NoSuchKey' ||
    err.name === 'NoSuchBucket' ||
    err.$metadata.httpStatusCode === 404
  );
}

/** ObjectStore over any S3-compatible endpoint (AWS, MinIO, R2). */
export class S3ObjectStore implements ObjectStore {
  readonly ensure_bucket: () => Promise<void>;

  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
    private readonly url_ttl_seconds: number
  ) {
    this.ensure_bucket = once_until_failure(() => this.create_bucket_if_absent());
  }

  private async create_bucket_if_absent(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return;
    } catch (err) {
      if (!is_not_found(err)) {
        throw err;
      }
    }

    logger.info('creating bucket', { bucket: this.bucket });
    await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
  }

  private async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (is_not_found(err)) {
        return false;
      }
      throw err;
    }
  }

  async put(key: string, data: Buffer, content_type: string): Promise<string> {
    await this.ensure_bucket();

    logger.debug('uploading object', { bucket: this.bucket, key, size: data.length });
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: data,
        ContentLength: data.length,
        ContentType: content_type || 'application/octet-stream',
      })
    );

    return this.presign(key);
  }

  async get(key: string): Promise<Buffer> {
    try {
      const result = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!result.Body) {
        return Buffer.alloc(0);
      }
      return Buffer.from(await result.Body.transformToByteArray());
    } catch (err) {
      if (is_not_found(err)) {
        throw new ObjectNotFoundError(key, { cause: err });
      }
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    logger.debug('deleting object', { bucket: this.bucket, key });

    if (!(await this.exists(key))) {
      throw new ObjectNotFoundError(key);
    }

    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));

    if (await this.exists(key)) {
      throw new ObjectStillPresentError(key);
    }
  }

  async presign(key: string): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: this.url_ttl_seconds,
    });
  }

  async ping(): Promise<void> {
    await this.ensure_bucket();
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }
}
