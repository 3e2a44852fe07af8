import fontData from './font.json';

export const FONT_BASE = 0x050;
export const GLYPH_HEIGHT: number = fontData.glyphHeight;

function parseGlyph(row: string): number[] {
  return row.trim().split(/\s+/).map((b) => parseInt(b, 16) & 0xff);
}

// 16 glyphs (hex digits 0-F) of GLYPH_HEIGHT bytes each, flattened in digit order.
export const FONT: Uint8Array = Uint8Array.from(fontData.glyphs.flatMap(parseGlyph));

if (FONT.length !== 16 * GLYPH_HEIGHT) {
  throw new Error(`font.json: expected ${16 * GLYPH_HEIGHT} bytes, got ${FONT.length}`);
}

export function glyphAddress(digit: number): number {
  return FONT_BASE + (digit & 0x0f) * GLYPH_HEIGHT;
}
