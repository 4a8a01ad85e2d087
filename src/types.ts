// src/types.ts

/* ------------------- CATALOG ------------------- */

export type Track = {
  path: string;
  name: string;
};

export type TrackCatalog = readonly Track[];

/* ------------------- STATE ------------------- */

export type PlaybackStatus = "stopped" | "playing" | "paused";

export type PlaybackState = {
  status: PlaybackStatus;
  trackIndex: number;
  volume: number; // 0..100
};

/* ------------------- EVENTS ------------------- */

export type ButtonLabel = "play-pause" | "next" | "volume-down" | "volume-up";

export const BUTTON_LABELS: readonly ButtonLabel[] = ["play-pause", "next", "volume-down", "volume-up"];

export type PlayerEvent =
  | { type: "button"; label: ButtonLabel }
  | { type: "media-ended"; loadId: number }
  | { type: "refresh" };

export type EventSink = (ev: PlayerEvent) => void;

/* ------------------- ENGINE ------------------- */

export type Position = {
  elapsedSec: number;
  durationSec: number;
};

export interface MediaEngine {
  /** Backend needs the track reloaded for a volume change to be heard. */
  readonly restartOnVolumeChange: boolean;
  /** Resolves to an id that this load's `media-ended` events carry. */
  load(track: Track): Promise<number>;
  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  setVolume(volume: number): Promise<void>;
  position(): Promise<Position | null>;
  close(): Promise<void>;
}
