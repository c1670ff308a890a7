import { z } from 'zod';
import { errorMessage } from '../core/errors';
import { parseDocument } from '../core/schema';
import { ObjectStore, PutMode, PutOutcome } from './objectStore.types';

export const readJsonDocument = async <T>(
  store: ObjectStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | undefined> => {
  const body = await store.get(key);
  if (!body) return undefined;
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString('utf-8'));
  } catch (err) {
    throw new Error(`Object ${key} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseDocument(schema, raw, key);
};

export const serializeDocument = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

export const writeJsonDocument = (
  store: ObjectStore,
  key: string,
  value: unknown,
  mode: PutMode = 'overwrite'
): Promise<PutOutcome> => store.put(key, serializeDocument(value), { mode, contentType: 'application/json' });
