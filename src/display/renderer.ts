import { PNG } from 'pngjs';
import type { ReadonlyFramebuffer } from './framebuffer';

export type RGBA = readonly [number, number, number, number];

export interface Palette {
  on: RGBA;
  off: RGBA;
}

export const DEFAULT_PALETTE: Palette = {
  on: [0xff, 0xff, 0xff, 0xff],
  off: [0x00, 0x00, 0x00, 0xff],
};

// Expand the 1-bit framebuffer to RGBA, each CHIP-8 pixel becoming a scale x scale block.
export function renderRGBA(fb: ReadonlyFramebuffer, scale = 1, palette: Palette = DEFAULT_PALETTE): Uint8Array {
  const s = Math.max(1, Math.floor(scale));
  const w = fb.width * s;
  const h = fb.height * s;
  const out = new Uint8Array(w * h * 4);
  for (let y = 0; y < h; y++) {
    const sy = Math.floor(y / s);
    for (let x = 0; x < w; x++) {
      const c = fb.isSet(Math.floor(x / s), sy) ? palette.on : palette.off;
      const o = (y * w + x) * 4;
      out[o] = c[0];
      out[o + 1] = c[1];
      out[o + 2] = c[2];
      out[o + 3] = c[3];
    }
  }
  return out;
}

export interface PngOptions {
  scale?: number;
  palette?: Palette;
}

export function encodePNG(fb: ReadonlyFramebuffer, opts: PngOptions = {}): Buffer {
  const scale = Math.max(1, Math.floor(opts.scale ?? 1));
  const width = fb.width * scale;
  const height = fb.height * scale;
  const rgba = renderRGBA(fb, scale, opts.palette);
  const png = new PNG({ width, height });
  // pngjs expects a Buffer; copy through a Node Buffer view
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}
