import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3';
import { TransientProviderError } from '../core/errors';
import { ObjectHead, ObjectStore, PutOptions, PutOutcome } from './objectStore.types';

export interface S3StoreConfig {
  bucket: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
}

const statusOf = (err: unknown): number | undefined =>
  err instanceof S3ServiceException ? err.$metadata.httpStatusCode : undefined;

const isNotFound = (err: unknown): boolean =>
  statusOf(err) === 404 || (err instanceof S3ServiceException && (err.name === 'NoSuchKey' || err.name === 'NotFound'));

const rethrow = (err: unknown, op: string, key: string): never => {
  const status = statusOf(err);
  if (status !== undefined && (status >= 500 || status === 429 || status === 409)) {
    throw new TransientProviderError(`S3 ${op} ${key} failed with ${status}`, { status });
  }
  throw err;
};

export class S3ObjectStore implements ObjectStore {
  readonly name = 's3';
  private s3: S3Client;
  private bucket: string;

  constructor(config: S3StoreConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.s3 =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle
      });
  }

  async get(key: string): Promise<Buffer | undefined> {
    try {
      const resp = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!resp.Body) return undefined;
      return Buffer.from(await resp.Body.transformToByteArray());
    } catch (err) {
      if (isNotFound(err)) return undefined;
      return rethrow(err, 'get', key);
    }
  }

  async put(key: string, body: Buffer | string, options: PutOptions = {}): Promise<PutOutcome> {
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: options.contentType ?? 'application/json',
          ServerSideEncryption: 'AES256',
          IfNoneMatch: options.mode === 'create-only' ? '*' : undefined
        })
      );
      console.log(`[S3] PUT | Key: ${key}`);
      return 'written';
    } catch (err) {
      if (options.mode === 'create-only' && statusOf(err) === 412) {
        console.log(`[S3] EXISTS | Key: ${key}`);
        return 'exists';
      }
      return rethrow(err, 'put', key);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
      console.log(`[S3] DELETE | Key: ${key}`);
    } catch (err) {
      if (isNotFound(err)) return;
      rethrow(err, 'delete', key);
    }
  }

  async list(prefix: string): Promise<ObjectHead[]> {
    const out: ObjectHead[] = [];
    let token: string | undefined;
    do {
      const resp = await this.s3
        .send(new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, ContinuationToken: token }))
        .catch((err: unknown) => rethrow(err, 'list', prefix));
      for (const obj of resp.Contents ?? []) {
        if (!obj.Key) continue;
        out.push({
          key: obj.Key,
          bytes: obj.Size ?? 0,
          lastModified: (obj.LastModified ?? new Date(0)).toISOString()
        });
      }
      token = resp.IsTruncated ? resp.NextContinuationToken : undefined;
    } while (token);
    return out.sort((a, b) => (a.key < b.key ? -1 : 1));
  }

  async head(key: string): Promise<ObjectHead | undefined> {
    try {
      const resp = await this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return {
        key,
        bytes: resp.ContentLength ?? 0,
        lastModified: (resp.LastModified ?? new Date(0)).toISOString()
      };
    } catch (err) {
      if (isNotFound(err)) return undefined;
      return rethrow(err, 'head', key);
    }
  }
}
