import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export function makeTempDir(prefix: string) {
  return fs.mkdtempSync(path.join(os.tmpdir(), `framedump-${prefix}-`));
}

export function removeDir(directory: string) {
  fs.rmSync(directory, { recursive: true, force: true });
}

export function listFiles(directory: string) {
  return fs.readdirSync(directory).sort();
}
