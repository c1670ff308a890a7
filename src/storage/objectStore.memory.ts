import { ObjectHead, ObjectStore, PutOptions, PutOutcome } from './objectStore.types';

interface StoredObject {
  body: Buffer;
  lastModified: string;
}

export type StoreOperation = 'get' | 'put' | 'delete' | 'list' | 'head';

/**
 * In-process store used for dry runs and tests. `failWhen` lets a caller make
 * selected operations reject, standing in for an unreachable bucket.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly name = 'memory';
  private objects = new Map<string, StoredObject>();
  private clock: () => Date;
  readonly operations: Array<{ op: StoreOperation; key: string }> = [];
  failWhen?: (op: StoreOperation, key: string) => boolean;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  private record(op: StoreOperation, key: string) {
    this.operations.push({ op, key });
    if (this.failWhen?.(op, key)) {
      throw new Error(`memory store: ${op} ${key} failed`);
    }
  }

  async get(key: string): Promise<Buffer | undefined> {
    this.record('get', key);
    const obj = this.objects.get(key);
    return obj ? Buffer.from(obj.body) : undefined;
  }

  async put(key: string, body: Buffer | string, options: PutOptions = {}): Promise<PutOutcome> {
    this.record('put', key);
    if (options.mode === 'create-only' && this.objects.has(key)) {
      return 'exists';
    }
    const buf = typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
    this.objects.set(key, { body: buf, lastModified: this.clock().toISOString() });
    return 'written';
  }

  async delete(key: string): Promise<void> {
    this.record('delete', key);
    this.objects.delete(key);
  }

  async list(prefix: string): Promise<ObjectHead[]> {
    this.record('list', prefix);
    return Array.from(this.objects.entries())
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, obj]) => ({ key, bytes: obj.body.length, lastModified: obj.lastModified }))
      .sort((a, b) => (a.key < b.key ? -1 : 1));
  }

  async head(key: string): Promise<ObjectHead | undefined> {
    this.record('head', key);
    const obj = this.objects.get(key);
    return obj ? { key, bytes: obj.body.length, lastModified: obj.lastModified } : undefined;
  }

  keys(): string[] {
    return Array.from(this.objects.keys()).sort();
  }

  mutations(): Array<{ op: StoreOperation; key: string }> {
    return this.operations.filter((o) => o.op === 'put' || o.op === 'delete');
  }
}
