export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export interface ReadonlyFramebuffer {
  readonly width: number;
  readonly height: number;
  isSet(x: number, y: number): boolean;
  countLit(): number;
  // Row-major copy, one byte per pixel (0 or 1).
  toBytes(): Uint8Array;
  toRows(): boolean[][];
}

// 64x32 monochrome display. Pixels only change through clear() and XOR sprite drawing.
export class Framebuffer implements ReadonlyFramebuffer {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;
  private pixels = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  // Bumped on every mutation so hosts can skip redrawing unchanged frames.
  private revision = 0;

  get version(): number {
    return this.revision;
  }

  clear(): void {
    this.pixels.fill(0);
    this.revision++;
  }

  isSet(x: number, y: number): boolean {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return false;
    return this.pixels[y * this.width + x] !== 0;
  }

  // XOR an 8-pixel-wide sprite, one byte per row, MSB leftmost.
  // The start position wraps modulo the screen size, as does every pixel of the sprite.
  // Returns true if any lit pixel was turned off.
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    const x0 = x % this.width;
    const y0 = y % this.height;
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row] & 0xff;
      if (bits === 0) continue;
      const py = (y0 + row) % this.height;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const px = (x0 + col) % this.width;
        const idx = py * this.width + px;
        if (this.pixels[idx] !== 0) collision = true;
        this.pixels[idx] ^= 1;
      }
    }
    this.revision++;
    return collision;
  }

  countLit(): number {
    let c = 0;
    for (let i = 0; i < this.pixels.length; i++) c += this.pixels[i];
    return c;
  }

  toBytes(): Uint8Array {
    return this.pixels.slice();
  }

  toRows(): boolean[][] {
    const out: boolean[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: boolean[] = new Array(this.width);
      for (let x = 0; x < this.width; x++) row[x] = this.pixels[y * this.width + x] !== 0;
      out.push(row);
    }
    return out;
  }
}
