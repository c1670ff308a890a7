export interface ObjectHead {
  key: string;
  bytes: number;
  lastModified: string;
}

// create-only never replaces an existing object; the store reports 'exists' instead.
export type PutMode = 'overwrite' | 'create-only';

export type PutOutcome = 'written' | 'exists';

export interface PutOptions {
  mode?: PutMode;
  contentType?: string;
}

export interface ObjectStore {
  readonly name: string;
  get(key: string): Promise<Buffer | undefined>;
  put(key: string, body: Buffer | string, options?: PutOptions): Promise<PutOutcome>;
  delete(key: string): Promise<void>;
  list(prefix: string): Promise<ObjectHead[]>;
  head(key: string): Promise<ObjectHead | undefined>;
}
