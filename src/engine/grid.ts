import { MINE, Pos } from "./types";
import { RandomSource, shuffle } from "./rng";

export interface Cell {
  mine: boolean;
  adjacency: number; // MINE for mines, else 0..8
  revealed: boolean;
  flagged: boolean;
}

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

// Row-major comparator
export function comparePos(a: Pos, b: Pos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function inBounds(row: number, col: number, rows: number, cols: number): boolean {
  return row >= 0 && row < rows && col >= 0 && col < cols;
}

/** Up to 8 surrounding cells, in row-major order */
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (inBounds(r, c, rows, cols)) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, adjacency: 0, revealed: false, flagged: false });
    }
    grid.push(row);
  }
  return grid;
}

// Uniform placement without replacement: shuffle every position, mine the first mineCount.
export function placeMines(grid: Cell[][], mineCount: number, rng: RandomSource): Cell[][] {
  const positions: Pos[] = [];
  for (let r = 0; r < grid.length; r++) {
    for (let c = 0; c < grid[r].length; c++) {
      positions.push({ row: r, col: c });
    }
  }
  shuffle(positions, rng);
  for (const p of positions.slice(0, mineCount)) {
    grid[p.row][p.col].mine = true;
  }
  return grid;
}

export function computeAdjacency(grid: Cell[][], rows: number, cols: number): void {
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (grid[r][c].mine) {
        grid[r][c].adjacency = MINE;
        continue;
      }
      let count = 0;
      for (const n of neighbours(r, c, rows, cols)) {
        if (grid[n.row][n.col].mine) count++;
      }
      grid[r][c].adjacency = count;
    }
  }
}
