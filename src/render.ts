// src/render.ts
import fs from "fs";
import { createCanvas, GlobalFonts, type Image } from "@napi-rs/canvas";
import { createLog } from "./log";
import type { PlaybackState, Position, Track } from "./types";

const log = createLog("render");

/** RGB888, row-major, `width * height * 3` bytes. */
export type Frame = {
  width: number;
  height: number;
  rgb: Buffer;
};

export interface DisplayPanel {
  push(frame: Frame): Promise<void>;
  close(): Promise<void>;
}

export type View = {
  state: PlaybackState;
  track: Track;
  position: Position | null;
  artwork: Image | null;
};

type Fonts = { title: string; small: string };

const WHITE = "rgb(255,255,255)";
const GREEN = "rgb(0,255,0)";
const RED = "rgb(255,0,0)";
const GREY = "rgb(200,200,200)";

const CONTROLS = ["A: Play/Pause", "B: Next Track", "X: Vol Down", "Y: Vol Up"];

/** Registers the panel fonts; missing files fall back to the default face. */
export function loadFonts(titlePath: string, smallPath: string): Fonts {
  const register = (file: string, alias: string, size: string): string => {
    if (fs.existsSync(file) && GlobalFonts.registerFromPath(file, alias)) return `${size} ${alias}`;
    log.warn(`font not found: ${file}, using default`);
    return `${size} sans-serif`;
  };
  return {
    title: register(titlePath, "PanelBold", "18px"),
    small: register(smallPath, "Panel", "14px"),
  };
}

export const DEFAULT_FONTS: Fonts = { title: "18px sans-serif", small: "14px sans-serif" };

export function formatTime(p: Position): string {
  return `Time: ${Math.floor(p.elapsedSec)}s / ${Math.floor(p.durationSec)}s`;
}

/** Pure: same view, same frame. */
export function composeFrame(view: View, width: number, height: number, fonts: Fonts = DEFAULT_FONTS): Frame {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext("2d");

  ctx.fillStyle = "rgb(0,0,0)";
  ctx.fillRect(0, 0, width, height);

  if (view.artwork && view.artwork.width > 0 && view.artwork.height > 0) {
    // contain + center, dimmed to 30%
    const scale = Math.min(width / view.artwork.width, height / view.artwork.height);
    const w = Math.round(view.artwork.width * scale);
    const h = Math.round(view.artwork.height * scale);
    ctx.globalAlpha = 0.3;
    ctx.drawImage(view.artwork, Math.floor((width - w) / 2), Math.floor((height - h) / 2), w, h);
    ctx.globalAlpha = 1;
  }

  const playing = view.state.status === "playing";
  ctx.textBaseline = "top";

  ctx.font = fonts.title;
  ctx.fillStyle = WHITE;
  ctx.fillText("Now Playing:", 10, 20);
  ctx.fillStyle = playing ? GREEN : RED;
  ctx.fillText(view.track.name, 10, 45);
  ctx.fillStyle = WHITE;
  ctx.fillText(`Volume: ${view.state.volume}%`, 10, 85);

  if (playing && view.position) {
    ctx.fillText(formatTime(view.position), 10, 120);
  }

  ctx.font = fonts.small;
  ctx.fillStyle = GREY;
  CONTROLS.forEach((c, i) => ctx.fillText(c, 10, 160 + i * 20));

  const rgba = ctx.getImageData(0, 0, width, height).data;
  const rgb = Buffer.alloc(width * height * 3);
  for (let src = 0, dst = 0; src < rgba.length; src += 4, dst += 3) {
    rgb[dst] = rgba[src];
    rgb[dst + 1] = rgba[src + 1];
    rgb[dst + 2] = rgba[src + 2];
  }
  return { width, height, rgb };
}

/** Composes views and pushes them to the panel. Callers never overlap calls. */
export class Renderer {
  constructor(
    private readonly panel: DisplayPanel,
    private readonly width: number,
    private readonly height: number,
    private readonly fonts: Fonts = DEFAULT_FONTS,
  ) {}

  async render(view: View): Promise<void> {
    await this.panel.push(composeFrame(view, this.width, this.height, this.fonts));
  }
}
