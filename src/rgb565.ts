// src/rgb565.ts
import type { Frame } from "./render";

export type Rotation = 0 | 90 | 180 | 270;

export function toRotation(deg: number): Rotation {
  if (deg === 0 || deg === 90 || deg === 180 || deg === 270) return deg;
  throw new RangeError(`Unsupported display rotation: ${deg}`);
}

/**
 * RGB888 → RGB565 big-endian, rotated clockwise by `rotation`.
 * 90/270 swap the frame's width and height.
 */
export function toRgb565(frame: Frame, rotation: Rotation): Buffer {
  const { width: w, height: h, rgb } = frame;
  const outW = rotation === 90 || rotation === 270 ? h : w;
  const out = Buffer.alloc(w * h * 2);

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      let ox = x;
      let oy = y;
      if (rotation === 90) { ox = h - 1 - y; oy = x; }
      else if (rotation === 180) { ox = w - 1 - x; oy = h - 1 - y; }
      else if (rotation === 270) { ox = y; oy = w - 1 - x; }

      const s = (y * w + x) * 3;
      const v = ((rgb[s] & 0xf8) << 8) | ((rgb[s + 1] & 0xfc) << 3) | (rgb[s + 2] >> 3);
      out.writeUInt16BE(v, (oy * outW + ox) * 2);
    }
  }
  return out;
}
