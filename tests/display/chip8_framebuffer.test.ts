import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';
import { Framebuffer, SCREEN_HEIGHT, SCREEN_WIDTH } from '../../src/display/framebuffer';
import { encodePNG, renderRGBA, type Palette } from '../../src/display/renderer';

describe('Framebuffer', () => {
  it('XORs sprite rows and reports collisions', () => {
    const fb = new Framebuffer();
    expect(fb.drawSprite(0, 0, [0xc0])).toBe(false);
    expect(fb.isSet(0, 0)).toBe(true);
    expect(fb.isSet(1, 0)).toBe(true);
    expect(fb.drawSprite(1, 0, [0x80])).toBe(true);
    expect(fb.isSet(1, 0)).toBe(false);
    expect(fb.countLit()).toBe(1);
  });

  it('wraps the start position and each pixel of the sprite', () => {
    const fb = new Framebuffer();
    fb.drawSprite(70, 40, [0x80]);
    expect(fb.isSet(6, 8)).toBe(true);
    fb.drawSprite(63, 31, [0xc0, 0x80]);
    expect(fb.isSet(63, 31)).toBe(true);
    expect(fb.isSet(0, 31)).toBe(true);
    expect(fb.isSet(63, 0)).toBe(true);
    expect(fb.countLit()).toBe(4);
  });

  it('treats coordinates off the grid as unlit', () => {
    const fb = new Framebuffer();
    fb.drawSprite(0, 0, [0xff]);
    expect(fb.isSet(-1, 0)).toBe(false);
    expect(fb.isSet(SCREEN_WIDTH, 0)).toBe(false);
    expect(fb.isSet(0, SCREEN_HEIGHT)).toBe(false);
  });

  it('clear() turns every pixel off and bumps the version', () => {
    const fb = new Framebuffer();
    fb.drawSprite(10, 10, [0xff, 0xff]);
    const v = fb.version;
    fb.clear();
    expect(fb.countLit()).toBe(0);
    expect(fb.version).toBe(v + 1);
  });

  it('toRows() is a 32x64 boolean grid matching isSet', () => {
    const fb = new Framebuffer();
    fb.drawSprite(3, 2, [0xa0]);
    const rows = fb.toRows();
    expect(rows).toHaveLength(SCREEN_HEIGHT);
    expect(rows.every((r) => r.length === SCREEN_WIDTH)).toBe(true);
    expect(rows[2].slice(0, 8)).toEqual([false, false, false, true, false, true, false, false]);
    expect(rows.flat().filter(Boolean)).toHaveLength(2);
  });

  it('toBytes() is a detached row-major copy', () => {
    const fb = new Framebuffer();
    fb.drawSprite(1, 1, [0x80]);
    const bytes = fb.toBytes();
    expect(bytes).toHaveLength(SCREEN_WIDTH * SCREEN_HEIGHT);
    expect(bytes[SCREEN_WIDTH + 1]).toBe(1);
    bytes[0] = 1;
    expect(fb.isSet(0, 0)).toBe(false);
  });
});

describe('renderer', () => {
  const palette: Palette = { on: [1, 2, 3, 4], off: [9, 8, 7, 6] };
  const pixelAt = (rgba: Uint8Array, width: number, x: number, y: number) => {
    const o = (y * width + x) * 4;
    return Array.from(rgba.subarray(o, o + 4));
  };

  it('renderRGBA expands each pixel to a scale x scale block', () => {
    const fb = new Framebuffer();
    fb.drawSprite(1, 0, [0x80]);
    const rgba = renderRGBA(fb, 2, palette);
    const w = SCREEN_WIDTH * 2;
    expect(rgba).toHaveLength(w * SCREEN_HEIGHT * 2 * 4);
    expect(pixelAt(rgba, w, 2, 0)).toEqual([1, 2, 3, 4]);
    expect(pixelAt(rgba, w, 3, 1)).toEqual([1, 2, 3, 4]);
    expect(pixelAt(rgba, w, 1, 1)).toEqual([9, 8, 7, 6]);
    expect(pixelAt(rgba, w, 4, 0)).toEqual([9, 8, 7, 6]);
  });

  it('renderRGBA clamps the scale to at least 1', () => {
    const rgba = renderRGBA(new Framebuffer(), 0);
    expect(rgba).toHaveLength(SCREEN_WIDTH * SCREEN_HEIGHT * 4);
  });

  it('encodePNG decodes back to the framebuffer contents', () => {
    const fb = new Framebuffer();
    fb.drawSprite(0, 0, [0x80]);
    fb.drawSprite(10, 5, [0xf0]);
    const png = PNG.sync.read(encodePNG(fb));
    expect(png.width).toBe(SCREEN_WIDTH);
    expect(png.height).toBe(SCREEN_HEIGHT);
    let mismatches = 0;
    for (let y = 0; y < SCREEN_HEIGHT; y++) {
      for (let x = 0; x < SCREEN_WIDTH; x++) {
        const o = (y * SCREEN_WIDTH + x) * 4;
        const expected = fb.isSet(x, y) ? 0xff : 0x00;
        if (png.data[o] !== expected || png.data[o + 3] !== 0xff) mismatches++;
      }
    }
    expect(mismatches).toBe(0);
  });

  it('encodePNG honours scale', () => {
    const fb = new Framebuffer();
    fb.drawSprite(63, 31, [0x80]);
    const png = PNG.sync.read(encodePNG(fb, { scale: 3, palette }));
    expect(png.width).toBe(SCREEN_WIDTH * 3);
    expect(png.height).toBe(SCREEN_HEIGHT * 3);
    const last = (png.width * png.height - 1) * 4;
    expect(Array.from(png.data.subarray(last, last + 4))).toEqual([1, 2, 3, 4]);
    expect(Array.from(png.data.subarray(0, 4))).toEqual([9, 8, 7, 6]);
  });
});
