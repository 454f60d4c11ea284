import fs from 'fs';
import debugLogger from '../services/debugLogger.js';
import { getRuntimeStatePath } from '../utils/paths.js';
import type { ConnectionMode } from '../types/models.js';
import { atomicWriteJson, isRecord, loadJsonFile } from './jsonStore.js';

/** What a foreground `xenray start` session publishes for stop/restart/status. */
export interface RuntimeState {
  pid: number;
  xray_pid: number | null;
  server_id: string;
  server_name: string;
  mode: ConnectionMode;
  started_at: string;
}

const isRuntimeState = (value: unknown): value is RuntimeState =>
  isRecord(value) &&
  typeof value.pid === 'number' &&
  (value.xray_pid === null || typeof value.xray_pid === 'number') &&
  typeof value.server_id === 'string' &&
  typeof value.server_name === 'string' &&
  (value.mode === 'proxy' || value.mode === 'vpn') &&
  typeof value.started_at === 'string';

const isRuntimeStateOrNull = (value: unknown): value is RuntimeState | null => value === null || isRuntimeState(value);

export class RuntimeStateRepository {
  constructor(private filePath: string = getRuntimeStatePath()) {}

  load(): RuntimeState | null {
    return loadJsonFile<RuntimeState | null>(this.filePath, null, isRuntimeStateOrNull);
  }

  save(state: RuntimeState): boolean {
    return atomicWriteJson(this.filePath, state);
  }

  clear(): void {
    try {
      if (fs.existsSync(this.filePath)) fs.unlinkSync(this.filePath);
    } catch (error) {
      debugLogger.warn('RuntimeState', `Failed to remove ${this.filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
