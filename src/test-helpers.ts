import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Notifier } from './notifications/notifier.js';

/**
 * Fresh temporary output directory
 */
export async function createOutputDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'recfetch-'));
}

export async function removeOutputDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Create files of the given sizes (in bytes) inside `dir`
 */
export async function touch(dir: string, files: Record<string, number>): Promise<void> {
  for (const [name, size] of Object.entries(files)) {
    await writeFile(join(dir, name), Buffer.alloc(size));
  }
}

export async function listDir(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}

export function createSilentNotifier(): Notifier {
  return {
    notify: vi.fn(),
    progress: vi.fn(),
    endProgress: vi.fn(),
  };
}
