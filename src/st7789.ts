// src/st7789.ts
import * as spi from "spi-device";
import type { SpiDevice, SpiMessage } from "spi-device";
import type { Gpio } from "onoff";
import { createLog } from "./log";
import { openOutputLine } from "./gpio";
import { toRgb565, toRotation, type Rotation } from "./rgb565";
import type { DisplayPanel, Frame } from "./render";

const log = createLog("st7789");

const CMD = {
  SWRESET: 0x01,
  SLPOUT: 0x11,
  NORON: 0x13,
  INVON: 0x21,
  DISPON: 0x29,
  CASET: 0x2a,
  RASET: 0x2b,
  RAMWR: 0x2c,
  MADCTL: 0x36,
  COLMOD: 0x3a,
} as const;

// spidev's default transfer limit
const MAX_CHUNK = 4096;

export type St7789Options = {
  bus: number;
  device: number;
  dcPin: number;
  backlightPin: number;
  speedHz: number;
  width: number;
  height: number;
  rotation: number;
};

const wait = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** ST7789 240×240 panel on spidev with separate data/command and backlight lines. */
export class St7789Panel implements DisplayPanel {
  private constructor(
    private readonly dev: SpiDevice,
    private readonly dc: Gpio,
    private readonly backlight: Gpio,
    private readonly opts: St7789Options & { rotation: Rotation },
  ) {}

  static async open(opts: St7789Options): Promise<St7789Panel> {
    const rotation = toRotation(opts.rotation);
    const dev = await new Promise<SpiDevice>((resolve, reject) => {
      const d = spi.open(opts.bus, opts.device, { mode: 0, maxSpeedHz: opts.speedHz }, (err) => (err ? reject(err) : resolve(d)));
    });
    const panel = new St7789Panel(dev, openOutputLine(opts.dcPin), openOutputLine(opts.backlightPin), { ...opts, rotation });
    await panel.init();
    return panel;
  }

  async push(frame: Frame): Promise<void> {
    const { width, height } = this.opts;
    await this.command(CMD.CASET, [0, 0, (width - 1) >> 8, (width - 1) & 0xff]);
    await this.command(CMD.RASET, [0, 0, (height - 1) >> 8, (height - 1) & 0xff]);
    await this.command(CMD.RAMWR);
    await this.data(toRgb565(frame, this.opts.rotation));
  }

  async close(): Promise<void> {
    await this.backlight.write(0);
    await new Promise<void>((resolve, reject) => this.dev.close((err) => (err ? reject(err) : resolve())));
    this.dc.unexport();
    this.backlight.unexport();
    log.info("Panel closed");
  }

  private async init(): Promise<void> {
    await this.backlight.write(1);
    await this.command(CMD.SWRESET);
    await wait(150);
    await this.command(CMD.MADCTL, [0x70]);
    await this.command(CMD.COLMOD, [0x05]);
    await this.command(CMD.INVON);
    await this.command(CMD.SLPOUT);
    await wait(120);
    await this.command(CMD.NORON);
    await this.command(CMD.DISPON);
    await wait(100);
    log.info("Panel ready");
  }

  private async command(cmd: number, args?: number[]): Promise<void> {
    await this.dc.write(0);
    await this.transfer(Buffer.from([cmd]));
    if (args?.length) await this.data(Buffer.from(args));
  }

  private async data(buf: Buffer): Promise<void> {
    await this.dc.write(1);
    for (let off = 0; off < buf.length; off += MAX_CHUNK) {
      await this.transfer(buf.subarray(off, Math.min(off + MAX_CHUNK, buf.length)));
    }
  }

  private transfer(buf: Buffer): Promise<void> {
    const msg: SpiMessage = { sendBuffer: buf, byteLength: buf.length, speedHz: this.opts.speedHz };
    return new Promise<void>((resolve, reject) => {
      this.dev.transfer([msg], (err) => (err ? reject(err) : resolve()));
    });
  }
}
