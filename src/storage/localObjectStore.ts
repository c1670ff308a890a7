import fs from 'fs';
import path from 'path';
import { ensureDir } from '../core/utils';
import { ObjectHead, ObjectStore, PutOptions, PutOutcome } from './objectStore.types';

// fs errors may come from another realm (e.g. a Jest sandbox), so no instanceof check.
const isErrno = (err: unknown): err is NodeJS.ErrnoException =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';

/** Directory-backed store for local runs; keys map onto relative file paths. */
export class LocalObjectStore implements ObjectStore {
  readonly name = 'local';
  private root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private fileFor(key: string): string {
    const file = path.resolve(this.root, key);
    if (!file.startsWith(this.root + path.sep)) {
      throw new Error(`Key escapes store root: ${key}`);
    }
    return file;
  }

  private headOf(key: string, file: string): ObjectHead {
    const stat = fs.statSync(file);
    return { key, bytes: stat.size, lastModified: stat.mtime.toISOString() };
  }

  async get(key: string): Promise<Buffer | undefined> {
    const file = this.fileFor(key);
    if (!fs.existsSync(file)) return undefined;
    return fs.readFileSync(file);
  }

  async put(key: string, body: Buffer | string, options: PutOptions = {}): Promise<PutOutcome> {
    const file = this.fileFor(key);
    ensureDir(path.dirname(file));
    if (options.mode === 'create-only') {
      try {
        fs.writeFileSync(file, body, { flag: 'wx' });
        return 'written';
      } catch (err) {
        if (isErrno(err) && err.code === 'EEXIST') return 'exists';
        throw err;
      }
    }
    // Write-then-rename so readers never observe a half-written object.
    const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
    fs.writeFileSync(tmp, body);
    fs.renameSync(tmp, file);
    return 'written';
  }

  async delete(key: string): Promise<void> {
    fs.rmSync(this.fileFor(key), { force: true });
  }

  async list(prefix: string): Promise<ObjectHead[]> {
    if (!fs.existsSync(this.root)) return [];
    const out: ObjectHead[] = [];
    const walk = (dir: string) => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else if (entry.isFile() && !entry.name.endsWith('.tmp')) {
          const key = path.relative(this.root, full).split(path.sep).join('/');
          if (key.startsWith(prefix)) out.push(this.headOf(key, full));
        }
      }
    };
    walk(this.root);
    return out.sort((a, b) => (a.key < b.key ? -1 : 1));
  }

  async head(key: string): Promise<ObjectHead | undefined> {
    const file = this.fileFor(key);
    if (!fs.existsSync(file)) return undefined;
    return this.headOf(key, file);
  }
}
