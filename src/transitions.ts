// src/transitions.ts
import type { PlaybackState, PlayerEvent } from "./types";

/** What the controller must ask the engine to do for a transition. */
export type Effect =
  | { kind: "none" }
  | { kind: "load-play" }
  | { kind: "pause" }
  | { kind: "resume" }
  | { kind: "volume" };

export type Transition = {
  state: PlaybackState;
  effect: Effect;
  render: boolean;
};

const NONE: Effect = { kind: "none" };

export function clampVolume(v: number): number {
  return Math.max(0, Math.min(100, v));
}

function advance(s: PlaybackState, catalogSize: number): Transition {
  const state = { ...s, trackIndex: (s.trackIndex + 1) % catalogSize };
  return {
    state,
    effect: s.status === "playing" ? { kind: "load-play" } : NONE,
    render: true,
  };
}

/**
 * The playback state machine. Pure: engine work is described by `effect`
 * and carried out by the controller, which may still revert to `stopped`
 * when the engine fails.
 */
export function transition(s: PlaybackState, ev: PlayerEvent, catalogSize: number, volumeStep = 5): Transition {
  switch (ev.type) {
    case "refresh":
      return { state: s, effect: NONE, render: true };

    case "media-ended":
      // only a playing track can end; anything else is a stale notification
      if (s.status !== "playing") return { state: s, effect: NONE, render: false };
      return advance(s, catalogSize);

    case "button":
      switch (ev.label) {
        case "play-pause":
          if (s.status === "stopped") return { state: { ...s, status: "playing" }, effect: { kind: "load-play" }, render: true };
          if (s.status === "playing") return { state: { ...s, status: "paused" }, effect: { kind: "pause" }, render: true };
          return { state: { ...s, status: "playing" }, effect: { kind: "resume" }, render: true };

        case "next":
          return advance(s, catalogSize);

        case "volume-down":
        case "volume-up": {
          const delta = ev.label === "volume-up" ? volumeStep : -volumeStep;
          const volume = clampVolume(s.volume + delta);
          if (volume === s.volume) return { state: s, effect: NONE, render: false };
          return { state: { ...s, volume }, effect: { kind: "volume" }, render: true };
        }
      }
  }
}
