import os from 'os';
import path from 'path';

export const APP_NAME = 'xenray';

/**
 * Per-user directory holding every persisted document.
 * XENRAY_CONFIG_DIR overrides the platform default.
 */
export const getConfigDir = (): string => {
  const override = process.env.XENRAY_CONFIG_DIR;
  if (override) {
    return override;
  }

  const home = os.homedir();
  switch (process.platform) {
    case 'win32':
      return path.join(process.env.APPDATA || path.join(home, 'AppData', 'Roaming'), APP_NAME);
    case 'darwin':
      return path.join(home, 'Library', 'Application Support', APP_NAME);
    default:
      return path.join(process.env.XDG_CONFIG_HOME || path.join(home, '.config'), APP_NAME);
  }
};

/** Scratch directory for generated backend configs, session files and the log file. */
export const getTempDir = (): string => {
  return process.env.XENRAY_TMP_DIR || path.join(os.tmpdir(), APP_NAME);
};

export const getLogFilePath = (): string => path.join(getTempDir(), 'xenray_app.log');

export const getRuntimeStatePath = (configDir: string = getConfigDir()): string =>
  path.join(configDir, 'runtime.json');
