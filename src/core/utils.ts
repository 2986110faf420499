import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { errorMessage } from './errors';

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = <T>(filePath: string): T => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw) as T;
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  // write-then-rename so a crash never leaves a half-written record
  const tmp = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(data, null, 2));
  fs.renameSync(tmp, filePath);
};

export const appendJSONLine = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.appendFileSync(filePath, `${JSON.stringify(data)}\n`);
};

export const readJSONLines = <T = unknown>(filePath: string): T[] => {
  if (!fs.existsSync(filePath)) return [];
  const content = fs.readFileSync(filePath, 'utf-8').trim();
  if (!content.length) return [];
  return content.split('\n').map((line, idx) => {
    try {
      return JSON.parse(line) as T;
    } catch (err) {
      throw new Error(`Corrupt line ${idx + 1} in ${filePath}: ${errorMessage(err)}`);
    }
  });
};

export const makeId = (prefix: string): string => `${prefix}-${crypto.randomUUID()}`;

export const mulberry32 = (seed: number) => {
  let t = seed + 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

// FNV-1a, used to seed the stub quote generator per symbol/date.
export const hashString = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};
