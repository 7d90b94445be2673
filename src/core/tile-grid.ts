/** A rectangular layer of optional tile ids. This is what the fill engine mutates. */
export interface TileGrid {
  readonly width: number;
  readonly height: number;

  /** Get the tile at (x, y). Returns null if out of bounds or empty. */
  tileAt(x: number, y: number): number | null;

  /** Set the tile at (x, y). Out-of-bounds writes are ignored. */
  setTileAt(x: number, y: number, tileId: number | null): void;

  /** Check if (x, y) is within bounds */
  inBounds(x: number, y: number): boolean;
}

/** Row-major in-memory implementation of TileGrid */
export class SimpleTileGrid implements TileGrid {
  private tiles: Array<number | null>;

  /** Pass `tiles` to work on an existing row-major array in place. Throws if its length doesn't match dimensions. */
  constructor(public readonly width: number, public readonly height: number, tiles?: Array<number | null>) {
    if (tiles && tiles.length !== width * height) {
      throw new Error(`Tile array length ${tiles.length} doesn't match grid dimensions ${width}x${height}`);
    }
    this.tiles = tiles ?? new Array<number | null>(width * height).fill(null);
  }

  /** View over an existing row-major array; writes go straight to it */
  static wrap(tiles: Array<number | null>, width: number, height: number): SimpleTileGrid {
    return new SimpleTileGrid(width, height, tiles);
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  tileAt(x: number, y: number): number | null {
    if (!this.inBounds(x, y)) return null;
    return this.tiles[y * this.width + x];
  }

  setTileAt(x: number, y: number, tileId: number | null): void {
    if (!this.inBounds(x, y)) return;
    this.tiles[y * this.width + x] = tileId;
  }

  clone(): SimpleTileGrid {
    return SimpleTileGrid.wrap(this.tiles.slice(), this.width, this.height);
  }

  /** Returns a copy of the internal tiles array (flat row-major) */
  toArray(): Array<number | null> {
    return this.tiles.slice();
  }
}
