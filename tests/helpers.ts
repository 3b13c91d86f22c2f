import type { Knowledge, NumberedCell, Pos } from "../src/engine/index";
import { posKey } from "../src/engine/index";

/**
 * Build a visibility snapshot from a picture, one string per row:
 * "." covered, "F" flagged, a digit is a revealed number.
 */
export function knowledgeFromPicture(lines: string[]): Knowledge {
  const numbers = new Map<string, NumberedCell>();
  const covered = new Map<string, Pos>();
  const flagged = new Map<string, Pos>();

  lines.forEach((line, row) => {
    [...line].forEach((ch, col) => {
      const p = { row, col };
      if (ch === ".") covered.set(posKey(p), p);
      else if (ch === "F") flagged.set(posKey(p), p);
      else numbers.set(posKey(p), { row, col, value: Number(ch) });
    });
  });

  return { rows: lines.length, cols: lines[0].length, numbers, covered, flagged };
}

/** Every cell of a board, row-major */
export function allCells(rows: number, cols: number): Pos[] {
  const out: Pos[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) out.push({ row: r, col: c });
  }
  return out;
}
