/**
 * Recording Locator
 *
 * FreePBX writes call recordings under the monitor spool, one folder per day
 * (YYYY/MM/DD), with the call's unique id inside the file name. This module
 * finds the newest matching file and loads it for upload.
 *
 * Missing or unreadable recordings surface as RecordingUnavailableError,
 * which the orchestrator downgrades to a warning.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { RecordingUnavailableError, errorMessage } from '../errors.js';
import type { RecordingFile } from '../crm/types.js';

const CONTENT_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.gsm': 'audio/gsm',
};

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? '' : name.slice(dot).toLowerCase();
}

/**
 * Newest recording under `dir` whose file name contains `uniqueId`,
 * or null when there is none (or the spool directory does not exist).
 */
export async function findRecording(dir: string, uniqueId: string): Promise<string | null> {
  let entries: string[];
  try {
    entries = await readdir(dir, { recursive: true });
  } catch (err) {
    console.warn('[recordings] Cannot list recordings directory', { dir, error: errorMessage(err) });
    return null;
  }

  let newest: { path: string; mtimeMs: number } | null = null;
  for (const entry of entries) {
    const name = basename(entry);
    if (!name.includes(uniqueId) || !(extensionOf(name) in CONTENT_TYPES)) continue;

    const path = join(dir, entry);
    try {
      const info = await stat(path);
      if (info.isFile() && (!newest || info.mtimeMs > newest.mtimeMs)) {
        newest = { path, mtimeMs: info.mtimeMs };
      }
    } catch {
      // Rotated away between readdir and stat
      continue;
    }
  }
  return newest?.path ?? null;
}

export async function loadRecording(path: string): Promise<RecordingFile> {
  const contentType = CONTENT_TYPES[extensionOf(path)];
  if (!contentType) {
    throw new RecordingUnavailableError(`Unsupported recording format: ${basename(path)}`);
  }

  try {
    const data = await readFile(path);
    if (data.length === 0) {
      throw new RecordingUnavailableError(`Recording is empty: ${basename(path)}`);
    }
    return { name: basename(path), contentType, data };
  } catch (err) {
    if (err instanceof RecordingUnavailableError) throw err;
    throw new RecordingUnavailableError(`Recording unreadable: ${basename(path)} (${errorMessage(err)})`);
  }
}
