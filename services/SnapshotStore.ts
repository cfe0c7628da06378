import { readFile, rename, rm, writeFile, access } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { SNAPSHOT_KEYS } from '../constants';
import { REGISTER_SPACES, Snapshot, SnapshotProjection } from '../types';
import { RegisterBank } from './RegisterBank';

export type SaveResult =
  | { success: true; path: string }
  | { success: false; error: 'IOError'; message: string };

export type LoadResult =
  | { success: true; snapshot: Snapshot }
  | { success: false; error: 'NotFound' | 'ParseError' | 'IOError'; message: string };

const slotEntries = z.record(z.string(), z.union([z.number().int(), z.boolean()]));

const snapshotFileSchema = z.object({
  coils: slotEntries.optional(),
  discrete_inputs: slotEntries.optional(),
  input_registers: slotEntries.optional(),
  holding_registers: slotEntries.optional()
});

/** Drops `#` comments (to end of line) and blank lines. */
export const stripComments = (text: string): string =>
  text
    .split(/\r?\n/)
    .map(line => line.replace(/#.*$/, '').trim())
    .filter(line => line.length > 0)
    .join('\n');

export const parseSnapshotText = (text: string): Snapshot => {
  const parsed = snapshotFileSchema.parse(JSON.parse(stripComments(text)));
  const snapshot: Snapshot = {};
  REGISTER_SPACES.forEach(space => {
    const entries = parsed[SNAPSHOT_KEYS[space]];
    if (entries) snapshot[space] = entries;
  });
  return snapshot;
};

export const serializeSnapshot = (snapshot: Snapshot): string => {
  const out: Record<string, Record<string, number | boolean>> = {};
  REGISTER_SPACES.forEach(space => {
    const entries = snapshot[space];
    if (entries) out[SNAPSHOT_KEYS[space]] = entries;
  });
  return JSON.stringify(out, null, 2) + '\n';
};

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

// Process-wide: temp file names stay unique across stores on the same path
let tmpCounter = 0;

const isNotFound = (e: unknown): boolean =>
  typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';

/**
 * SnapshotStore
 *
 * Shares a projection of a register bank between processes through one file.
 * There is no lock: every save writes a private temporary file and renames
 * it over the target, so readers only ever see a complete version. Any load
 * may be stale.
 */
export class SnapshotStore {
  constructor(public readonly filePath: string) {}

  public async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  public async save(bank: RegisterBank, projection: SnapshotProjection): Promise<SaveResult> {
    return this.saveSnapshot(bank.toSnapshot(projection));
  }

  public async saveSnapshot(snapshot: Snapshot): Promise<SaveResult> {
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${tmpCounter++}.tmp`);

    try {
      await writeFile(tmpPath, serializeSnapshot(snapshot), 'utf8');
      await rename(tmpPath, this.filePath);
      return { success: true, path: this.filePath };
    } catch (e) {
      const leftover = await rm(tmpPath, { force: true }).then(
        () => '',
        (cleanupError: unknown) => `; could not remove ${tmpPath}: ${errorMessage(cleanupError)}`
      );
      return { success: false, error: 'IOError', message: `${errorMessage(e)}${leftover}` };
    }
  }

  public async load(): Promise<LoadResult> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (e) {
      if (isNotFound(e)) return { success: false, error: 'NotFound', message: `${this.filePath} does not exist yet` };
      return { success: false, error: 'IOError', message: errorMessage(e) };
    }

    try {
      return { success: true, snapshot: parseSnapshotText(text) };
    } catch (e) {
      return { success: false, error: 'ParseError', message: `${this.filePath}: ${errorMessage(e)}` };
    }
  }
}
