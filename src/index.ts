#!/usr/bin/env node
// src/index.ts
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { BUTTON_CONFIG, DISPLAY_CONFIG, MPV_CONFIG, PLAYER_CONFIG } from "./config";
import { EmbeddedArtwork } from "./artwork";
import { MpvEngine } from "./engine";
import { StartupError, errMsg } from "./errors";
import { openGpioLine } from "./gpio";
import { createLog, isLogLevel, setLogLevel } from "./log";
import { startMpv } from "./mpv";
import { PngPanel } from "./png-panel";
import { Renderer, loadFonts, type DisplayPanel } from "./render";
import { St7789Panel } from "./st7789";
import { initialVolume, startPlayer } from "./startup";

const log = createLog("main");

/** CLI args */
const argv = yargs(hideBin(process.argv))
  .option("library", { type: "string", default: PLAYER_CONFIG.libraryDir, describe: "Directory scanned for audio files" })
  .option("panel", { choices: ["st7789", "png"] as const, default: "st7789" as const, describe: "Display output" })
  .option("random-start", { type: "boolean", default: PLAYER_CONFIG.randomStart, describe: "Start on a random track" })
  .option("volume", { type: "number", default: PLAYER_CONFIG.defaultVolume, describe: "Initial volume (0-100)" })
  .option("log-level", { type: "string", describe: "debug | info | warn | error" })
  .strict()
  .parseSync();

async function openPanel(): Promise<DisplayPanel> {
  if (argv.panel === "png") return new PngPanel(DISPLAY_CONFIG.pngPath);
  return St7789Panel.open({
    bus: DISPLAY_CONFIG.spiBus,
    device: DISPLAY_CONFIG.spiDevice,
    dcPin: DISPLAY_CONFIG.dcPin,
    backlightPin: DISPLAY_CONFIG.backlightPin,
    speedHz: DISPLAY_CONFIG.spiSpeedHz,
    width: DISPLAY_CONFIG.width,
    height: DISPLAY_CONFIG.height,
    rotation: DISPLAY_CONFIG.rotation,
  });
}

async function main(): Promise<void> {
  const level = argv["log-level"];
  if (level !== undefined) {
    if (!isLogLevel(level)) throw new StartupError(`Unknown log level: ${level}`);
    setLogLevel(level);
  }

  const volume = initialVolume(argv.volume);
  const panel = await openPanel();
  const renderer = new Renderer(panel, DISPLAY_CONFIG.width, DISPLAY_CONFIG.height, loadFonts(DISPLAY_CONFIG.font, DISPLAY_CONFIG.smallFont));

  const player = await startPlayer(
    {
      libraryDir: argv.library,
      extensions: PLAYER_CONFIG.extensions,
      pins: BUTTON_CONFIG.pins,
      debounceMs: BUTTON_CONFIG.debounceMs,
      randomStart: argv["random-start"],
      volume,
      volumeStep: PLAYER_CONFIG.volumeStep,
      tickMs: PLAYER_CONFIG.tickMs,
    },
    {
      openLine: openGpioLine,
      createEngine: async (push) => {
        const handle = await startMpv(volume);
        return new MpvEngine(handle, push, MPV_CONFIG.loadTimeoutMs, handle.kill);
      },
      renderer,
      artwork: new EmbeddedArtwork(),
    },
  ).catch(async (e: unknown) => {
    await panel.close();
    throw e;
  });

  const onSignal = (sig: NodeJS.Signals) => {
    log.info(`Received ${sig}`);
    player
      .shutdown()
      .then(() => panel.close())
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        log.error("shutdown failed:", errMsg(e));
        process.exit(1);
      });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await player.done;
}

// BOOT
main().catch((e: unknown) => {
  if (e instanceof StartupError) log.error(e.message);
  else log.error("fatal", e);
  process.exit(1);
});
