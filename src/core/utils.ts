import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { PipelineConfig, validatePipelineConfig } from './schema';

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
};

export const loadConfig = (configPath: string): PipelineConfig => {
  const result = validatePipelineConfig(readJSONFile(configPath));
  if (!result.success) {
    throw new Error(`Invalid config ${configPath}: ${result.errors.join('; ')}`);
  }
  return result.value;
};

export const defaultConfigPath = () => path.resolve(process.cwd(), 'src/config/default.json');

export const sha256Hex = (body: Buffer | string): string => crypto.createHash('sha256').update(body).digest('hex');

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const mulberry32 = (seed: number) => {
  let t = seed + 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

// FNV-1a, used to seed the deterministic stubs.
export const hashString = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const round = (value: number, digits = 2): number => Number(value.toFixed(digits));

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const average = (arr: number[]): number => (arr.length ? sum(arr) / arr.length : 0);
