// src/engine.ts
import { EngineError, errMsg } from "./errors";
import { createLog } from "./log";
import type { MpvEvent, MpvIpc } from "./mpv";
import type { EventSink, MediaEngine, Position, Track } from "./types";

const log = createLog("engine");

type LoadWaiter = {
  promise: Promise<void>;
  settle: (err: Error | null) => void;
};

/** Resolves on the first `settle`, or rejects once `timeoutMs` passes. */
function loadWaiter(timeoutMs: number, track: Track): LoadWaiter {
  let done = false;
  let resolveFn: () => void = () => {};
  let rejectFn: (e: Error) => void = () => {};

  const promise = new Promise<void>((resolve, reject) => {
    resolveFn = resolve;
    rejectFn = reject;
  });
  const timer = setTimeout(() => {
    settle(new EngineError(`Load timeout (${timeoutMs}ms): ${track.name}`));
  }, timeoutMs);

  function settle(err: Error | null): void {
    if (done) return;
    done = true;
    clearTimeout(timer);
    if (err) rejectFn(err);
    else resolveFn();
  }

  return { promise, settle };
}

/** The loaded media: one at a time, with its own end-of-media subscription. */
type Resource = {
  loadId: number;
  track: Track;
  entryId: number | null;
  detach: () => void;
};

/**
 * MediaEngine on top of one idle mpv instance. End-of-media for the live
 * resource is reported to `push` as `media-ended`, tagged with the id its
 * `load` resolved to; nothing else leaves here.
 */
export class MpvEngine implements MediaEngine {
  readonly restartOnVolumeChange = false;
  private resource: Resource | null = null;
  private loads = 0;

  constructor(
    private readonly ipc: MpvIpc,
    private readonly push: EventSink,
    private readonly loadTimeoutMs: number,
    private readonly onClose: () => void = () => ipc.close(),
  ) {}

  get loadedTrack(): Track | null {
    return this.resource?.track ?? null;
  }

  async load(track: Track): Promise<number> {
    this.release();

    const res: Resource = { loadId: ++this.loads, track, entryId: null, detach: () => {} };
    this.resource = res;

    const loaded = loadWaiter(this.loadTimeoutMs, track);

    res.detach = this.ipc.on((ev: MpvEvent) => {
      switch (ev.type) {
        case "start-file":
          // the first start-file after loadfile belongs to this resource
          if (res.entryId === null) res.entryId = ev.entryId;
          break;
        case "file-loaded":
          loaded.settle(null);
          break;
        case "end-file":
          if (res.entryId === null || ev.entryId !== res.entryId) return;
          if (ev.reason === "error") {
            loaded.settle(new EngineError(`Cannot load ${track.name}: ${ev.error ?? "unknown error"}`));
          } else if (ev.reason === "eof") {
            log.debug(`end of media: ${track.name}`);
            this.push({ type: "media-ended", loadId: res.loadId });
          }
          break;
        default:
          break;
      }
    });

    try {
      await Promise.all([this.ipc.request(["loadfile", track.path, "replace"]), loaded.promise]);
    } catch (e) {
      loaded.settle(null);
      if (this.resource === res) this.release();
      throw e instanceof EngineError ? e : new EngineError(errMsg(e), { cause: e });
    }
    log.info(`Loaded: ${track.name}`);
    return res.loadId;
  }

  async play(): Promise<void> {
    this.requireResource("play");
    await this.ipc.request(["set_property", "pause", false]);
  }

  async pause(): Promise<void> {
    this.requireResource("pause");
    await this.ipc.request(["set_property", "pause", true]);
  }

  async stop(): Promise<void> {
    this.release();
    await this.ipc.request(["stop"]);
  }

  async setVolume(volume: number): Promise<void> {
    await this.ipc.request(["set_property", "volume", Math.max(0, Math.min(100, volume))]);
  }

  async position(): Promise<Position | null> {
    if (!this.resource) return null;
    try {
      const [elapsed, duration] = await Promise.all([
        this.ipc.request(["get_property", "time-pos"]),
        this.ipc.request(["get_property", "duration"]),
      ]);
      if (typeof elapsed !== "number" || typeof duration !== "number") return null;
      return { elapsedSec: elapsed, durationSec: duration };
    } catch (e) {
      // unavailable while mpv is between files
      log.debug("position unavailable:", errMsg(e));
      return null;
    }
  }

  async close(): Promise<void> {
    this.release();
    try {
      await this.ipc.send(["quit"]);
    } catch (e) {
      log.warn("quit failed:", errMsg(e));
    }
    this.onClose();
  }

  /** Detaches the live resource's subscription; later notifications for it are dropped. */
  private release(): void {
    const res = this.resource;
    if (!res) return;
    res.detach();
    this.resource = null;
  }

  private requireResource(op: string): void {
    if (!this.resource) throw new EngineError(`${op}: no media loaded`);
  }
}
