import * as fs from 'node:fs';
import * as path from 'node:path';
import { FILE_PERMISSIONS } from './constants.js';

/**
 * Write `content` next to `filePath` and rename it into place, so readers see
 * either the old document or the new one.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true, mode: FILE_PERMISSIONS.DATA_DIR });

  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tmp, content, { encoding: 'utf-8', mode: FILE_PERMISSIONS.DATA_FILE });
    fs.renameSync(tmp, filePath);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

export function writeJsonAtomic(filePath: string, data: unknown): void {
  writeFileAtomic(filePath, JSON.stringify(data, null, 2) + '\n');
}
