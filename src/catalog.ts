// src/catalog.ts
import fs from "fs/promises";
import path from "path";
import { StartupError, errMsg } from "./errors";
import type { Track, TrackCatalog } from "./types";

/**
 * Scans `dir` once for audio files. Files are grouped by extension, in the
 * order of `extensions`, and sorted by name within a group.
 * A missing, unreadable or empty directory is a startup error.
 */
export async function loadCatalog(dir: string, extensions: readonly string[]): Promise<TrackCatalog> {
  let names: string[];
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    names = entries.filter((e) => e.isFile()).map((e) => e.name);
  } catch (e) {
    throw new StartupError(`Audio library not readable: ${dir} (${errMsg(e)})`, { cause: e });
  }

  const tracks: Track[] = [];
  for (const ext of extensions) {
    const suffix = `.${ext.toLowerCase()}`;
    const group = names.filter((n) => n.toLowerCase().endsWith(suffix)).sort();
    for (const name of group) {
      tracks.push({ path: path.join(dir, name), name });
    }
  }

  if (tracks.length === 0) {
    throw new StartupError(`No audio files found in ${dir}`);
  }
  return Object.freeze(tracks);
}

export function pickStartIndex(catalog: TrackCatalog, random: boolean): number {
  return random ? Math.floor(Math.random() * catalog.length) : 0;
}
