import fs from 'fs';
import path from 'path';
import debugLogger from '../services/debugLogger.js';

export type Guard<T> = (value: unknown) => value is T;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string');

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const ensureDir = (dir: string): void => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

/**
 * Replaces `filePath` with `content` through a sibling `.tmp` file and a rename,
 * so readers never observe a truncated document.
 */
export const atomicWrite = (filePath: string, content: string): boolean => {
  const tempPath = `${filePath}.tmp`;
  try {
    ensureDir(path.dirname(filePath));
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, filePath);
    return true;
  } catch (error) {
    debugLogger.error('Storage', `Failed to write ${filePath}`, { error: errorMessage(error) });
    try {
      if (fs.existsSync(tempPath)) fs.unlinkSync(tempPath);
    } catch (cleanupError) {
      debugLogger.warn('Storage', `Failed to remove ${tempPath}`, { error: errorMessage(cleanupError) });
    }
    return false;
  }
};

export const atomicWriteJson = (filePath: string, data: unknown): boolean =>
  atomicWrite(filePath, JSON.stringify(data, null, 2));

/** Reads a whole file; missing or unreadable files yield null. */
export const readTextFile = (filePath: string): string | null => {
  try {
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    debugLogger.error('Storage', `Failed to read ${filePath}`, { error: errorMessage(error) });
    return null;
  }
};

/**
 * Loads a JSON document, returning `fallback` when the file is missing,
 * unparsable or does not pass `guard`.
 */
export const loadJsonFile = <T>(filePath: string, fallback: T, guard: Guard<T>): T => {
  const raw = readTextFile(filePath);
  if (raw === null) {
    return fallback;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (guard(parsed)) {
      return parsed;
    }
    debugLogger.warn('Storage', `Unexpected document shape in ${filePath}, using defaults`);
  } catch (error) {
    debugLogger.error('Storage', `Failed to parse ${filePath}`, { error: errorMessage(error) });
  }
  return fallback;
};
