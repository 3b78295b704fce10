import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export function tmpDb(label: string = 'store'): string {
  return path.join(os.tmpdir(), `mnemos-${label}-test-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

export function removeDb(dbPath: string): void {
  for (const suffix of ['', '-journal', '-wal', '-shm']) {
    try {
      fs.unlinkSync(dbPath + suffix);
    } catch {
      // Not every suffix exists
    }
  }
}

export function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'mnemos-test-'));
}

export function cleanup(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
