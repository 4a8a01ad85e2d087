// src/mpv.ts
import { spawn, spawnSync, type ChildProcess } from "child_process";
import crypto from "crypto";
import fs from "fs";
import net from "net";
import type { Duplex } from "stream";
import { MPV_CONFIG } from "./config";
import { EngineError } from "./errors";
import { createLog } from "./log";

const log = createLog("mpv");

export type MpvEvent =
  | { type: "start-file"; entryId: number | null }
  | { type: "file-loaded" }
  | { type: "end-file"; reason: string; entryId: number | null; error?: string };

export type MpvIpc = {
  send: (command: unknown[]) => Promise<void>;
  request: (command: unknown[]) => Promise<unknown>;
  on: (fn: (ev: MpvEvent) => void) => () => void;
  close: () => void;
};

export type MpvHandle = MpvIpc & {
  proc: ChildProcess;
  kill: () => void;
};

const wait = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/* ------------------- PROCESS ------------------- */

function findPlayerBinary(): string {
  if (MPV_CONFIG.bin) return MPV_CONFIG.bin;

  const ok = (cmd: string): boolean => {
    try {
      return spawnSync(cmd, ["--version"], { stdio: "ignore" }).status === 0;
    } catch {
      return false;
    }
  };
  if (ok("mpv")) return "mpv";
  if (ok("mpvnet")) return "mpvnet";
  throw new EngineError("mpv not found. Install mpv or set MPV_BIN.");
}

export function splitArgs(str: string): string[] {
  const m = str.match(/(?:[^\s"]+|"[^"]*")+/g);
  if (!m) return [];
  return m.map((s) => (s.startsWith('"') && s.endsWith('"') ? s.slice(1, -1) : s));
}

export function buildArgs(ipcPath: string, volume: number): string[] {
  const args = [
    ...MPV_CONFIG.baseArgs,
    `--volume=${Math.max(0, Math.min(100, volume))}`,
    `--input-ipc-server=${ipcPath}`,
  ];
  if (MPV_CONFIG.audioDevice) args.push(`--audio-device=${MPV_CONFIG.audioDevice}`);

  // extras are appended last so they override the defaults above
  args.push(...splitArgs(MPV_CONFIG.extraArgs));
  return args;
}

async function connectIpc(ipcPath: string, proc: ChildProcess, timeoutMs: number): Promise<net.Socket> {
  const start = Date.now();
  let delay = 20;
  let lastErr: unknown = null;

  while (Date.now() - start < timeoutMs) {
    if (proc.exitCode !== null) {
      throw new EngineError(`mpv exited before IPC was ready (exit code: ${proc.exitCode})`);
    }

    try {
      const sock = net.connect(ipcPath);
      await new Promise<void>((res, rej) => {
        sock.once("connect", () => {
          sock.removeAllListeners("error");
          res();
        });
        sock.once("error", rej);
      });
      return sock;
    } catch (e) {
      lastErr = e;
      await wait(delay);
      delay = Math.min(delay * 1.5, 200);
    }
  }
  throw new EngineError("mpv IPC timeout", { cause: lastErr });
}

/** Starts one idle mpv process and connects to its IPC socket. */
export async function startMpv(volume: number): Promise<MpvHandle> {
  const bin = findPlayerBinary();

  const id = crypto.randomBytes(4).toString("hex");
  const ipcPath = process.platform === "win32" ? `\\\\.\\pipe\\player_mpv_${id}` : `/tmp/player_mpv_${id}.sock`;

  if (process.platform !== "win32" && fs.existsSync(ipcPath)) fs.unlinkSync(ipcPath);

  log.info(`Starting ${bin}`);
  const proc = spawn(bin, buildArgs(ipcPath, volume), { stdio: ["ignore", "ignore", "ignore"] });

  proc.on("error", (e) => log.error("spawn error:", e.message));
  proc.on("exit", (code, sig) => {
    if (code !== 0 && code !== null) log.error(`mpv exited abnormally (code ${code}, signal ${sig})`);
  });

  let sock: net.Socket;
  try {
    sock = await connectIpc(ipcPath, proc, MPV_CONFIG.ipcConnectTimeoutMs);
  } catch (e) {
    proc.kill("SIGKILL");
    throw e;
  }

  const ipc = createIpc(sock, MPV_CONFIG.requestTimeoutMs);
  proc.once("exit", () => ipc.close());

  const kill = () => {
    ipc.close();
    if (proc.exitCode === null) proc.kill("SIGKILL");
  };

  return { ...ipc, proc, kill };
}

/* ------------------- IPC ------------------- */

function lineReader(stream: Duplex, onLine: (l: string) => void) {
  let buf = "";
  stream.setEncoding("utf8");
  stream.on("data", (chunk: string) => {
    buf += chunk;
    for (;;) {
      const i = buf.indexOf("\n");
      if (i < 0) break;
      const line = buf.slice(0, i);
      buf = buf.slice(i + 1);
      if (line.trim()) onLine(line);
    }
  });
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function entryIdOf(obj: Record<string, unknown>): number | null {
  return typeof obj.playlist_entry_id === "number" ? obj.playlist_entry_id : null;
}

export function parseEvent(obj: Record<string, unknown>): MpvEvent | null {
  switch (obj.event) {
    case "start-file":
      return { type: "start-file", entryId: entryIdOf(obj) };
    case "file-loaded":
      return { type: "file-loaded" };
    case "end-file":
      return {
        type: "end-file",
        reason: typeof obj.reason === "string" ? obj.reason : "unknown",
        entryId: entryIdOf(obj),
        error: typeof obj.file_error === "string" ? obj.file_error : undefined,
      };
    default:
      return null;
  }
}

type Pending = {
  resolve: (data: unknown) => void;
  reject: (e: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * JSON IPC over a connected stream: newline-delimited commands, replies
 * matched by `request_id`, and unsolicited events fanned out to listeners.
 */
export function createIpc(stream: Duplex, requestTimeoutMs: number): MpvIpc {
  const listeners = new Set<(ev: MpvEvent) => void>();
  const pending = new Map<number, Pending>();
  let nextRequestId = 1;
  let closed = false;

  const emit = (ev: MpvEvent) => {
    for (const fn of [...listeners]) {
      try {
        fn(ev);
      } catch (e) {
        log.error("listener error", e);
      }
    }
  };

  lineReader(stream, (line) => {
    let obj: unknown;
    try {
      obj = JSON.parse(line);
    } catch {
      log.debug("unparsable IPC line:", line);
      return;
    }
    if (!isRecord(obj)) return;

    if (typeof obj.request_id === "number" && "error" in obj) {
      const p = pending.get(obj.request_id);
      if (!p) return;
      pending.delete(obj.request_id);
      clearTimeout(p.timer);
      if (obj.error === "success") p.resolve(obj.data);
      else p.reject(new EngineError(`mpv: ${String(obj.error)}`));
      return;
    }

    const ev = parseEvent(obj);
    if (ev) emit(ev);
  });

  const write = (payload: Record<string, unknown>) =>
    new Promise<void>((resolve, reject) => {
      if (closed || stream.destroyed || !stream.writable) {
        reject(new EngineError("mpv IPC closed"));
        return;
      }
      stream.write(JSON.stringify(payload) + "\n", (err) => (err ? reject(err) : resolve()));
    });

  const close = () => {
    if (closed) return;
    closed = true;
    for (const [, p] of pending) {
      clearTimeout(p.timer);
      p.reject(new EngineError("mpv IPC closed"));
    }
    pending.clear();
    listeners.clear();
    stream.destroy();
  };

  stream.on("close", close);
  stream.on("error", (e) => log.error("IPC error:", e.message));

  return {
    send: (command) => write({ command }),

    request: (command) => {
      const requestId = nextRequestId++;
      return new Promise<unknown>((resolve, reject) => {
        const timer = setTimeout(() => {
          pending.delete(requestId);
          reject(new EngineError(`mpv request timeout: ${String(command[0])}`));
        }, requestTimeoutMs);
        pending.set(requestId, { resolve, reject, timer });

        write({ command, request_id: requestId }).catch((e: unknown) => {
          pending.delete(requestId);
          clearTimeout(timer);
          reject(e);
        });
      });
    },

    on: (fn) => {
      listeners.add(fn);
      return () => {
        listeners.delete(fn);
      };
    },

    close,
  };
}
