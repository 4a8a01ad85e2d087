// src/startup.ts
import { ButtonInput, bindButtons, type LineFactory } from "./buttons";
import { loadCatalog, pickStartIndex } from "./catalog";
import { StartupError, errMsg } from "./errors";
import { createLog } from "./log";
import { PlaybackController, type ViewRenderer } from "./player";
import { EventQueue } from "./queue";
import type { ArtworkSource } from "./artwork";
import { BUTTON_LABELS, type EventSink, type MediaEngine, type PlayerEvent, type TrackCatalog } from "./types";

const log = createLog("startup");

export type PlayerOptions = {
  libraryDir: string;
  extensions: readonly string[];
  pins: readonly number[];
  debounceMs: number;
  randomStart: boolean;
  volume: number;
  volumeStep: number;
  tickMs: number;
};

export type PlayerDeps = {
  openLine: LineFactory;
  createEngine: (push: EventSink) => Promise<MediaEngine>;
  renderer: ViewRenderer;
  artwork: ArtworkSource | null;
};

export type RunningPlayer = {
  catalog: TrackCatalog;
  controller: PlaybackController;
  /** Settles when the drain loop has exited. */
  done: Promise<void>;
  shutdown: () => Promise<void>;
};

/** Rounds and clamps a configured volume to 0..100; anything non-numeric is fatal. */
export function initialVolume(raw: number): number {
  if (!Number.isFinite(raw)) throw new StartupError(`Invalid volume: ${raw}`);
  return Math.max(0, Math.min(100, Math.round(raw)));
}

/**
 * Checks the startup preconditions in order (catalog, input lines, engine)
 * and starts the drain loop. Any precondition failure rejects with a
 * StartupError before the first render.
 */
export async function startPlayer(opts: PlayerOptions, deps: PlayerDeps): Promise<RunningPlayer> {
  const catalog = await loadCatalog(opts.libraryDir, opts.extensions);
  log.info(`Loaded ${catalog.length} audio files from ${opts.libraryDir}`);

  const queue = new EventQueue<PlayerEvent>();
  const push: EventSink = (ev) => queue.push(ev);

  const buttons = new ButtonInput(bindButtons(opts.pins, BUTTON_LABELS), push, opts.debounceMs);
  buttons.start(deps.openLine);

  let engine: MediaEngine;
  try {
    engine = await deps.createEngine(push);
  } catch (e) {
    buttons.stop();
    throw new StartupError(`Media engine unavailable: ${errMsg(e)}`, { cause: e });
  }

  const controller = new PlaybackController(catalog, queue, engine, deps.renderer, deps.artwork, {
    startIndex: pickStartIndex(catalog, opts.randomStart),
    volume: opts.volume,
    volumeStep: opts.volumeStep,
    tickMs: opts.tickMs,
  });

  const done = controller.run();

  let stopping: Promise<void> | null = null;
  const shutdown = () => {
    if (stopping) return stopping;
    stopping = (async () => {
      log.info("Shutting down...");
      controller.stop();
      await done;
      await engine.close();
      buttons.stop();
      log.info("Cleanup completed");
    })();
    return stopping;
  };

  return { catalog, controller, done, shutdown };
}
