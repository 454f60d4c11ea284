import path from 'path';
import debugLogger from '../services/debugLogger.js';
import { getConfigDir } from '../utils/paths.js';
import { atomicWrite, atomicWriteJson, isStringArray, loadJsonFile, readTextFile } from './jsonStore.js';

export const MAX_RECENT_FILES = 20;

export interface RecentFilesOptions {
  /**
   * When false, absolute paths are refused along with traversal segments.
   * Defaults to true: config files picked by the user usually live outside
   * the working directory.
   */
  allowAbsolute?: boolean;
}

export const hasTraversalSegment = (filePath: string): boolean =>
  filePath.split(/[\\/]+/).includes('..');

export class RecentFilesRepository {
  private recentPath: string;
  private lastPath: string;
  private allowAbsolute: boolean;

  constructor(configDir: string = getConfigDir(), options: RecentFilesOptions = {}) {
    this.recentPath = path.join(configDir, 'recent_files.json');
    this.lastPath = path.join(configDir, 'last_entry.txt');
    this.allowAbsolute = options.allowAbsolute ?? true;
  }

  isValidPath(filePath: unknown): filePath is string {
    if (typeof filePath !== 'string' || filePath.trim() === '') {
      return false;
    }
    if (hasTraversalSegment(filePath)) {
      return false;
    }
    if (!this.allowAbsolute && (path.isAbsolute(filePath) || filePath.startsWith('/') || filePath.startsWith('\\'))) {
      return false;
    }
    return true;
  }

  getAll(): string[] {
    return loadJsonFile(this.recentPath, [], isStringArray).filter(f => this.isValidPath(f));
  }

  /** Moves `filePath` to the front of the list and marks it last selected. */
  add(filePath: string): boolean {
    if (!this.isValidPath(filePath)) {
      debugLogger.warn('RecentFiles', `Invalid file path for recent files: ${filePath}`);
      return false;
    }

    const recent = [filePath, ...this.getAll().filter(f => f !== filePath)].slice(0, MAX_RECENT_FILES);
    if (!atomicWriteJson(this.recentPath, recent)) {
      return false;
    }
    return this.setLastSelected(filePath);
  }

  remove(filePath: string): boolean {
    if (!this.isValidPath(filePath)) {
      return false;
    }
    const recent = this.getAll();
    if (!recent.includes(filePath)) {
      return false;
    }
    return atomicWriteJson(this.recentPath, recent.filter(f => f !== filePath));
  }

  getLastSelected(): string | null {
    const value = readTextFile(this.lastPath);
    if (value === null) {
      return null;
    }
    const trimmed = value.trim();
    return this.isValidPath(trimmed) ? trimmed : null;
  }

  setLastSelected(filePath: string): boolean {
    if (!this.isValidPath(filePath)) {
      return false;
    }
    return atomicWrite(this.lastPath, filePath);
  }
}
