export const BLANK_SYMBOL = "_";

export interface TapeBounds {
  start: number;
  end: number;
}

export interface TapeCell {
  position: number;
  symbol: string;
}

/**
 * Two-way unbounded tape. Positions never written read as the blank symbol.
 * The bounds cover every stored position and are what `cells()` and
 * `toDisplayString()` render.
 */
export class Tape {
  private readonly store = new Map<number, string>();
  private range: TapeBounds | null = null;

  constructor(input = "") {
    Array.from(input).forEach((symbol, position) => {
      this.set(position, symbol);
    });
  }

  get bounds(): TapeBounds | null {
    return this.range === null ? null : { start: this.range.start, end: this.range.end };
  }

  get(position: number): string {
    return this.store.get(position) ?? BLANK_SYMBOL;
  }

  set(position: number, symbol: string): void {
    this.store.set(position, symbol);

    if (this.range === null) {
      this.range = { start: position, end: position };
      return;
    }

    if (position < this.range.start) {
      this.range.start = position;
    } else if (position > this.range.end) {
      this.range.end = position;
    }
  }

  isBlank(): boolean {
    return this.store.size === 0;
  }

  cells(): TapeCell[] {
    if (this.range === null) {
      return [];
    }

    const cells: TapeCell[] = [];
    for (let position = this.range.start; position <= this.range.end; position += 1) {
      cells.push({ position, symbol: this.get(position) });
    }
    return cells;
  }

  toDisplayString(): string {
    return this.cells()
      .map((cell) => cell.symbol)
      .join("");
  }
}
