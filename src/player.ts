// src/player.ts
import { errMsg } from "./errors";
import { createLog } from "./log";
import { EventQueue } from "./queue";
import { transition, type Effect } from "./transitions";
import type { ArtworkSource } from "./artwork";
import type { View } from "./render";
import type { MediaEngine, PlaybackState, PlayerEvent, TrackCatalog } from "./types";

const log = createLog("player");

export interface ViewRenderer {
  render(view: View): Promise<void>;
}

export type ControllerOptions = {
  startIndex: number;
  volume: number;
  volumeStep: number;
  tickMs: number;
};

const REFRESH: PlayerEvent = { type: "refresh" };

/**
 * Sole owner of the playback state. Everything reaches it through the
 * queue; `run` drains it on one async loop, so state writes never interleave.
 */
export class PlaybackController {
  private state: PlaybackState;
  // what the engine currently holds, if anything
  private loaded: { index: number; loadId: number } | null = null;
  private running = false;

  constructor(
    private readonly catalog: TrackCatalog,
    private readonly queue: EventQueue<PlayerEvent>,
    private readonly engine: MediaEngine,
    private readonly renderer: ViewRenderer,
    private readonly artwork: ArtworkSource | null,
    private readonly opts: ControllerOptions,
  ) {
    if (catalog.length === 0) throw new RangeError("PlaybackController needs a non-empty catalog");
    this.state = {
      status: "stopped",
      trackIndex: Math.max(0, Math.min(catalog.length - 1, opts.startIndex)),
      volume: opts.volume,
    };
  }

  snapshot(): PlaybackState {
    return { ...this.state };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Renders the initial frame, then drains the queue until `stop()`. */
  async run(): Promise<void> {
    this.running = true;
    log.info(`Started with ${this.catalog.length} tracks`);
    await this.renderNow();

    while (this.running) await this.step();
    log.info("Drain loop stopped");
  }

  /** Takes and applies exactly one event (a refresh on timeout). Nothing is applied once stopped. */
  async step(): Promise<void> {
    const ev = await this.queue.take(this.opts.tickMs);
    if (this.queue.isClosed) return;
    await this.apply(ev ?? REFRESH);
  }

  /** Cooperative: the loop exits after the event in progress. */
  stop(): void {
    this.running = false;
    this.queue.close();
  }

  private async apply(ev: PlayerEvent): Promise<void> {
    if (ev.type === "media-ended" && ev.loadId !== this.loaded?.loadId) {
      log.debug(`stale media-ended (load ${ev.loadId}) dropped`);
      return;
    }

    const prev = this.state;
    const t = transition(prev, ev, this.catalog.length, this.opts.volumeStep);
    this.state = t.state;

    if (t.effect.kind !== "none") {
      log.debug(`${describe(ev)}: ${prev.status} -> ${t.state.status} (${t.effect.kind})`);
      await this.perform(t.effect, prev);
    }
    if (t.render) await this.renderNow();
  }

  private async perform(effect: Effect, prev: PlaybackState): Promise<void> {
    try {
      switch (effect.kind) {
        case "load-play":
          await this.loadAndPlay();
          break;
        case "pause":
          await this.engine.pause();
          break;
        case "resume":
          // a Next while paused moved the index away from what the engine holds
          if (this.loaded?.index === this.state.trackIndex) await this.engine.play();
          else await this.loadAndPlay();
          break;
        case "volume":
          await this.applyVolume(prev);
          break;
        case "none":
          break;
      }
    } catch (e) {
      log.error(`${effect.kind} failed:`, errMsg(e));
      await this.revertToStopped();
    }
  }

  /** Leaves the engine holding nothing so it agrees with `stopped`. */
  private async revertToStopped(): Promise<void> {
    this.state = { ...this.state, status: "stopped" };
    this.loaded = null;
    try {
      await this.engine.stop();
    } catch (e) {
      log.warn("stop failed:", errMsg(e));
    }
  }

  private async loadAndPlay(): Promise<void> {
    const track = this.catalog[this.state.trackIndex];
    this.loaded = null;
    const loadId = await this.engine.load(track);
    this.loaded = { index: this.state.trackIndex, loadId };
    await this.engine.setVolume(this.state.volume);
    await this.engine.play();
    log.info(`Playing: ${track.name}`);
  }

  private async applyVolume(prev: PlaybackState): Promise<void> {
    try {
      await this.engine.setVolume(this.state.volume);
    } catch (e) {
      // playback goes on at the old level
      log.warn("volume failed:", errMsg(e));
      return;
    }
    log.info(`Volume ${this.state.volume}%`);

    if (this.engine.restartOnVolumeChange && prev.status === "playing") {
      await this.loadAndPlay();
    }
  }

  private async renderNow(): Promise<void> {
    const s = this.snapshot();
    const track = this.catalog[s.trackIndex];
    try {
      const position = s.status === "stopped" ? null : await this.engine.position();
      const artwork = this.artwork ? await this.artwork.get(track) : null;
      await this.renderer.render({ state: s, track, position, artwork });
    } catch (e) {
      log.error("render failed:", errMsg(e));
    }
  }
}

function describe(ev: PlayerEvent): string {
  return ev.type === "button" ? `button ${ev.label}` : ev.type;
}
