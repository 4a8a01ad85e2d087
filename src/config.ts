// src/config.ts
import "dotenv/config";

function intEnv(name: string, def: number, min?: number, max?: number): number {
  const raw = (process.env[name] || "").trim();
  const m = raw.match(/^-?\d+/);
  let n = m ? Number(m[0]) : def;
  if (Number.isNaN(n)) n = def;
  if (typeof min === "number") n = Math.max(min, n);
  if (typeof max === "number") n = Math.min(max, n);
  return n;
}

function boolEnv(name: string, def: boolean): boolean {
  const raw = (process.env[name] || "").trim().toLowerCase();
  if (!raw) return def;
  return raw === "1" || raw === "true" || raw === "yes";
}

function listEnv(name: string, def: number[]): number[] {
  const raw = (process.env[name] || "").trim();
  if (!raw) return def;
  const parts = raw.split(",").map((s) => Number(s.trim()));
  return parts.every((n) => Number.isInteger(n) && n >= 0) ? parts : def;
}

export const PLAYER_CONFIG = {
  libraryDir: (process.env.AUDIO_LIBRARY || "audio_library").trim(),
  extensions: ["mp3", "wav", "m4a", "aac"],
  defaultVolume: intEnv("PLAYER_DEFAULT_VOLUME", 50, 0, 100),
  volumeStep: 5,
  // bounded queue wait; a timeout becomes a refresh tick
  tickMs: 1000,
  randomStart: boolEnv("PLAYER_RANDOM_START", false),
};

export const BUTTON_CONFIG = {
  // BCM numbering: A, B, X, Y
  pins: listEnv("BUTTON_PINS", [5, 6, 16, 24]),
  debounceMs: 250,
};

export const MPV_CONFIG = {
  bin: (process.env.MPV_BIN || "").trim(),
  audioDevice: (process.env.MPV_AUDIO_DEVICE || "").trim(),
  extraArgs: (process.env.MPV_ADDITIONAL_OPTS || "").trim(),

  baseArgs: [
    "--no-video",
    "--idle=yes",
    "--input-terminal=no",
    "--term-osd=no",
    "--load-scripts=no",
    "--audio-display=no",
    "--keep-open=no",
  ],

  ipcConnectTimeoutMs: intEnv("MPV_IPC_TIMEOUT_MS", 5000, 500),
  requestTimeoutMs: 2000,
  loadTimeoutMs: intEnv("MPV_LOAD_TIMEOUT_MS", 10000, 1000),
};

export const DISPLAY_CONFIG = {
  width: 240,
  height: 240,
  rotation: intEnv("DISPLAY_ROTATION", 90, 0, 270),
  spiBus: 0,
  spiDevice: 1,
  dcPin: 9,
  backlightPin: 13,
  spiSpeedHz: 80 * 1000 * 1000,
  pngPath: (process.env.DISPLAY_PNG_PATH || "frame.png").trim(),
  font: (process.env.DISPLAY_FONT || "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf").trim(),
  smallFont: (process.env.DISPLAY_SMALL_FONT || "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf").trim(),
};

export const LOG_CONFIG = {
  level: (process.env.LOG_LEVEL || "info").trim().toLowerCase(),
};
