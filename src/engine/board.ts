import { GameStatus, Pos } from "./types";
import {
  Cell,
  computeAdjacency,
  createEmptyGrid,
  inBounds,
  neighbours,
  placeMines,
  posKey,
} from "./grid";
import { RandomSource, resolveRandomSource } from "./rng";

function validateDimensions(rows: number, cols: number, mineCount: number): void {
  if (!Number.isInteger(rows) || rows < 1) {
    throw new RangeError(`rows must be a positive integer, got ${rows}`);
  }
  if (!Number.isInteger(cols) || cols < 1) {
    throw new RangeError(`cols must be a positive integer, got ${cols}`);
  }
  if (!Number.isInteger(mineCount) || mineCount < 1 || mineCount >= rows * cols) {
    throw new RangeError(
      `mineCount must be an integer in [1, ${rows * cols}), got ${mineCount}`,
    );
  }
}

/**
 * Minesweeper board state machine.
 *
 * The mine layout and adjacency counts are fixed at construction. Play only moves
 * forward: InProgress → Lost when a mine is revealed, InProgress → Won when the last
 * non-mine cell is revealed. Once terminal, every mutator is a no-op.
 */
export class Board {
  readonly rows: number;
  readonly cols: number;
  readonly mineCount: number;
  private readonly grid: Cell[][];
  private currentStatus: GameStatus = GameStatus.InProgress;
  private readonly safeCellCount: number;
  private openedCount = 0;
  private flagged = 0;

  constructor(rows: number, cols: number, mineCount: number, seed?: number | RandomSource) {
    validateDimensions(rows, cols, mineCount);
    this.rows = rows;
    this.cols = cols;
    this.mineCount = mineCount;
    this.safeCellCount = rows * cols - mineCount;
    this.grid = createEmptyGrid(rows, cols);
    placeMines(this.grid, mineCount, resolveRandomSource(seed));
    computeAdjacency(this.grid, rows, cols);
  }

  /** Board with an explicit mine layout */
  static fromMines(rows: number, cols: number, mines: Pos[]): Board {
    validateDimensions(rows, cols, mines.length);
    const keys = new Set<string>();
    for (const m of mines) {
      if (!inBounds(m.row, m.col, rows, cols)) {
        throw new RangeError(`Mine (${m.row}, ${m.col}) is outside a ${rows}x${cols} board`);
      }
      keys.add(posKey(m));
    }
    if (keys.size !== mines.length) {
      throw new RangeError("Mine positions must be distinct");
    }

    const board = new Board(rows, cols, mines.length, 0);
    board.relayMines(mines);
    return board;
  }

  // Only valid before play starts
  private relayMines(mines: Pos[]): void {
    for (const row of this.grid) {
      for (const cell of row) cell.mine = false;
    }
    for (const m of mines) this.grid[m.row][m.col].mine = true;
    computeAdjacency(this.grid, this.rows, this.cols);
  }

  private cellAt(pos: Pos): Cell {
    if (!inBounds(pos.row, pos.col, this.rows, this.cols)) {
      throw new RangeError(`Cell (${pos.row}, ${pos.col}) is outside a ${this.rows}x${this.cols} board`);
    }
    return this.grid[pos.row][pos.col];
  }

  get status(): GameStatus {
    return this.currentStatus;
  }

  /** Number of revealed non-mine cells */
  get revealedCount(): number {
    return this.openedCount;
  }

  get flagCount(): number {
    return this.flagged;
  }

  isGameOver(): boolean {
    return this.currentStatus !== GameStatus.InProgress;
  }

  hasWon(): boolean {
    return this.currentStatus === GameStatus.Won;
  }

  isMine(pos: Pos): boolean {
    return this.cellAt(pos).mine;
  }

  /** MINE for mine cells, otherwise the number of neighbouring mines */
  adjacency(pos: Pos): number {
    return this.cellAt(pos).adjacency;
  }

  isRevealed(pos: Pos): boolean {
    return this.cellAt(pos).revealed;
  }

  isFlagged(pos: Pos): boolean {
    return this.cellAt(pos).flagged;
  }

  /** Cells neither revealed nor flagged, row-major */
  coveredCells(): Pos[] {
    const out: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const cell = this.grid[r][c];
        if (!cell.revealed && !cell.flagged) out.push({ row: r, col: c });
      }
    }
    return out;
  }

  /**
   * Reveal a cell. Returns false only when the reveal hit a mine.
   * Terminal boards, flagged cells and revealed cells are left untouched.
   */
  reveal(pos: Pos): boolean {
    const cell = this.cellAt(pos);
    if (this.isGameOver() || cell.flagged || cell.revealed) return true;

    if (cell.mine) {
      cell.revealed = true;
      this.currentStatus = GameStatus.Lost;
      return false;
    }

    this.floodReveal(pos);
    if (this.openedCount === this.safeCellCount) {
      this.currentStatus = GameStatus.Won;
    }
    return true;
  }

  // Breadth-first: zero cells expand, numbered cells stop the fill.
  private floodReveal(start: Pos): void {
    const queue: Pos[] = [start];
    for (let head = 0; head < queue.length; head++) {
      const p = queue[head];
      const cell = this.grid[p.row][p.col];
      if (cell.revealed || cell.flagged || cell.mine) continue;
      cell.revealed = true;
      this.openedCount++;
      if (cell.adjacency !== 0) continue;
      for (const n of neighbours(p.row, p.col, this.rows, this.cols)) {
        const nc = this.grid[n.row][n.col];
        if (!nc.revealed && !nc.flagged) queue.push(n);
      }
    }
  }

  flag(pos: Pos): void {
    const cell = this.cellAt(pos);
    if (this.isGameOver() || cell.revealed || cell.flagged) return;
    cell.flagged = true;
    this.flagged++;
  }

  unflag(pos: Pos): void {
    const cell = this.cellAt(pos);
    if (this.isGameOver() || cell.revealed || !cell.flagged) return;
    cell.flagged = false;
    this.flagged--;
  }
}
