import { MINE, Pos } from "./types";
import { neighbours, posKey } from "./grid";
import type { Board } from "./board";

export interface NumberedCell extends Pos {
  value: number;
}

/**
 * What the agent may see of a board at one instant. Every map is keyed by posKey
 * and iterates in row-major order.
 */
export interface Knowledge {
  rows: number;
  cols: number;
  numbers: Map<string, NumberedCell>; // revealed non-mine cells
  covered: Map<string, Pos>;          // neither revealed nor flagged
  flagged: Map<string, Pos>;
}

export interface NeighbourBuckets {
  covered: Pos[];
  flaggedCount: number;
}

export function extractKnowledge(board: Board): Knowledge {
  const numbers = new Map<string, NumberedCell>();
  const covered = new Map<string, Pos>();
  const flagged = new Map<string, Pos>();

  for (let r = 0; r < board.rows; r++) {
    for (let c = 0; c < board.cols; c++) {
      const p = { row: r, col: c };
      if (board.isFlagged(p)) {
        flagged.set(posKey(p), p);
      } else if (board.isRevealed(p)) {
        const value = board.adjacency(p);
        if (value !== MINE) numbers.set(posKey(p), { row: r, col: c, value });
      } else {
        covered.set(posKey(p), p);
      }
    }
  }

  return { rows: board.rows, cols: board.cols, numbers, covered, flagged };
}

export function neighbourBuckets(knowledge: Knowledge, cell: Pos): NeighbourBuckets {
  const covered: Pos[] = [];
  let flaggedCount = 0;
  for (const n of neighbours(cell.row, cell.col, knowledge.rows, knowledge.cols)) {
    const key = posKey(n);
    if (knowledge.flagged.has(key)) flaggedCount++;
    else if (knowledge.covered.has(key)) covered.push(n);
  }
  return { covered, flaggedCount };
}
