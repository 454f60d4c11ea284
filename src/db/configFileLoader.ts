import fs from 'fs';
import debugLogger from '../services/debugLogger.js';
import { isProfileConfig } from '../types/models.js';
import type { ProfileConfig } from '../types/models.js';
import { hasTraversalSegment } from './recentFilesRepository.js';
import { isRecord } from './jsonStore.js';

export interface ConfigLoadResult {
  config: Record<string, unknown> | null;
  /** True when the file is gone or unusable and should leave the recent list. */
  shouldRemoveFromRecent: boolean;
}

// A string literal is matched first so comment markers inside it survive.
const COMMENT_PATTERN = /("[^"\\]*(?:\\.[^"\\]*)*")|\/\/[^\n]*|\/\*[\s\S]*?\*\//g;

export const stripJsonComments = (content: string): string =>
  content.replace(COMMENT_PATTERN, (_match: string, quoted: string | undefined) => quoted ?? '');

/** Reads user supplied Xray JSON files, tolerating // and block comments. */
export class ConfigFileLoader {
  load(filePath: string): ConfigLoadResult {
    if (!filePath || hasTraversalSegment(filePath)) {
      debugLogger.warn('ConfigFileLoader', `Invalid file path: ${filePath}`);
      return { config: null, shouldRemoveFromRecent: true };
    }

    if (!fs.existsSync(filePath)) {
      return { config: null, shouldRemoveFromRecent: true };
    }

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(stripJsonComments(content));
      if (!isRecord(parsed)) {
        debugLogger.error('ConfigFileLoader', `Config file is not a JSON object: ${filePath}`);
        return { config: null, shouldRemoveFromRecent: true };
      }
      return { config: parsed, shouldRemoveFromRecent: false };
    } catch (error) {
      debugLogger.error('ConfigFileLoader', `Error loading config file ${filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return { config: null, shouldRemoveFromRecent: true };
    }
  }

  validate(config: unknown): config is ProfileConfig {
    return isProfileConfig(config);
  }
}
