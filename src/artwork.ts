// src/artwork.ts
import { loadImage, type Image } from "@napi-rs/canvas";
import { parseFile, selectCover } from "music-metadata";
import { errMsg } from "./errors";
import { createLog } from "./log";
import type { Track } from "./types";

const log = createLog("artwork");

export interface ArtworkSource {
  get(track: Track): Promise<Image | null>;
}

/**
 * Embedded cover art (ID3 APIC, MP4 covr, FLAC/Vorbis pictures).
 * Remembers the last track only: the panel shows one track at a time.
 */
export class EmbeddedArtwork implements ArtworkSource {
  private last: { path: string; image: Image | null } | null = null;

  async get(track: Track): Promise<Image | null> {
    if (this.last?.path === track.path) return this.last.image;

    let image: Image | null = null;
    try {
      const meta = await parseFile(track.path, { skipPostHeaders: true });
      const cover = selectCover(meta.common.picture);
      if (cover) image = await loadImage(cover.data);
    } catch (e) {
      log.warn(`no artwork for ${track.name}:`, errMsg(e));
    }

    this.last = { path: track.path, image };
    return image;
  }
}
