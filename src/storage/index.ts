import path from 'path';
import { LocalObjectStore } from './localObjectStore';
import { MemoryObjectStore } from './objectStore.memory';
import { ObjectStore } from './objectStore.types';
import { S3ObjectStore } from './s3ObjectStore';

export const getObjectStore = (env: NodeJS.ProcessEnv = process.env): ObjectStore => {
  const kind = (env.OBJECT_STORE || 'local').toLowerCase();
  if (kind === 's3') {
    const bucket = env.DATA_BUCKET;
    if (!bucket) {
      throw new Error('OBJECT_STORE=s3 but DATA_BUCKET is not set.');
    }
    return new S3ObjectStore({
      bucket,
      region: env.AWS_REGION || undefined,
      endpoint: env.AWS_ENDPOINT_URL || undefined,
      forcePathStyle: Boolean(env.AWS_ENDPOINT_URL)
    });
  }
  if (kind === 'memory') {
    console.warn('OBJECT_STORE=memory; nothing written by this process will persist.');
    return new MemoryObjectStore();
  }
  return new LocalObjectStore(env.LOCAL_STORE_DIR || path.resolve(process.cwd(), 'data_store'));
};

export { LocalObjectStore, MemoryObjectStore, S3ObjectStore };
export type { ObjectStore };
export { StoreLayout } from './layout';
