// src/buttons.ts
import { createLog } from "./log";
import { StartupError, errMsg } from "./errors";
import type { ButtonLabel, EventSink } from "./types";

const log = createLog("buttons");

/** One hardware input line, configured for falling-edge callbacks. */
export interface InputLine {
  readonly id: number;
  watch(onEdge: () => void): void;
  release(): void;
}

export type LineFactory = (id: number) => InputLine;

export type ButtonBinding = { line: number; label: ButtonLabel };

export function bindButtons(pins: readonly number[], labels: readonly ButtonLabel[]): ButtonBinding[] {
  if (pins.length !== labels.length) {
    throw new StartupError(`Expected ${labels.length} button pins, got ${pins.length}`);
  }
  return pins.map((line, i) => ({ line, label: labels[i] }));
}

/**
 * Turns raw edges into `button` events. Each line accepts at most one edge
 * per debounce window, counted from the last accepted edge.
 */
export class ButtonInput {
  private lines: InputLine[] = [];
  private lastAccepted = new Map<number, number>();

  constructor(
    private readonly bindings: readonly ButtonBinding[],
    private readonly push: EventSink,
    private readonly debounceMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Configures every line; any failure releases what was configured and throws. */
  start(openLine: LineFactory): void {
    for (const b of this.bindings) {
      try {
        const line = openLine(b.line);
        line.watch(() => this.onEdge(b));
        this.lines.push(line);
      } catch (e) {
        this.stop();
        throw new StartupError(`Cannot configure input line ${b.line} (${b.label}): ${errMsg(e)}`, { cause: e });
      }
    }
    log.info(`Watching ${this.lines.length} buttons`);
  }

  stop(): void {
    for (const line of this.lines) {
      try {
        line.release();
      } catch (e) {
        log.warn(`release line ${line.id} failed:`, errMsg(e));
      }
    }
    this.lines = [];
  }

  private onEdge(b: ButtonBinding): void {
    const t = this.now();
    const last = this.lastAccepted.get(b.line);
    if (last !== undefined && t - last < this.debounceMs) return;

    this.lastAccepted.set(b.line, t);
    log.debug(`pressed ${b.label}`);
    this.push({ type: "button", label: b.label });
  }
}
