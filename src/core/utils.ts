import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { SourceUnavailableError } from './errors';

export const QUANTITY_EPSILON = 1e-6;

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

// Readers never observe a half-written document: write beside the target, then rename over it.
export const writeJSONFileAtomic = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(data, null, 2));
  fs.renameSync(tmp, filePath);
};

export const safeUuid = (prefix = 'id') => {
  if (typeof crypto !== 'undefined' && 'randomUUID' in crypto) {
    return crypto.randomUUID();
  }
  return `${prefix}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
};

export const normalizeSymbol = (symbol: string) => symbol.trim().toUpperCase();

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

// Broker notional orders accept at most two decimals.
export const roundCents = (value: number): number => roundTo(value, 2);

// Splitting capital rounds down so the parts never add up to more than the whole.
export const floorCents = (value: number): number => Math.floor(value * 100 + 1e-9) / 100;

export const isZeroQuantity = (quantity: number) => Math.abs(quantity) <= QUANTITY_EPSILON;

export const withTimeout = async <T>(work: Promise<T>, ms: number, source: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new SourceUnavailableError(source, `timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
};

export const hashString = (input: string): number => {
  let hash = 0x811c9dc5; // FNV offset basis
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193); // FNV prime
  }
  return hash >>> 0;
};
