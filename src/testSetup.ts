import fs from 'fs';
import os from 'os';
import path from 'path';

// Keeps the shared logger's file and generated configs out of the real temp dir.
process.env.XENRAY_TMP_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'xenray-test-'));
