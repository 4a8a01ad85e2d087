// src/png-panel.ts
import fs from "fs/promises";
import { createCanvas } from "@napi-rs/canvas";
import type { DisplayPanel, Frame } from "./render";

/** Writes every frame to one PNG file; for running without the panel. */
export class PngPanel implements DisplayPanel {
  constructor(private readonly file: string) {}

  async push(frame: Frame): Promise<void> {
    const canvas = createCanvas(frame.width, frame.height);
    const ctx = canvas.getContext("2d");
    const img = ctx.createImageData(frame.width, frame.height);
    for (let src = 0, dst = 0; src < frame.rgb.length; src += 3, dst += 4) {
      img.data[dst] = frame.rgb[src];
      img.data[dst + 1] = frame.rgb[src + 1];
      img.data[dst + 2] = frame.rgb[src + 2];
      img.data[dst + 3] = 255;
    }
    ctx.putImageData(img, 0, 0);
    await fs.writeFile(this.file, await canvas.encode("png"));
  }

  async close(): Promise<void> {}
}
