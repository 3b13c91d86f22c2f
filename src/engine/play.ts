import { Action, GameStatus, Pos } from "./types";
import type { Board } from "./board";
import { Agent, isLogicalAction } from "./agent";

export interface PlayOptions {
  // Revealed before the agent is asked when the board is untouched; null skips it
  openingMove?: Pos | null;
}

export interface GameOutcome {
  status: GameStatus;
  won: boolean;
  logicMoves: number;
  guessMoves: number;
  flagsSet: number;
  actions: Action[];
}

function untouched(board: Board): boolean {
  return board.revealedCount === 0 && board.flagCount === 0;
}

/** Drive one game until the board is terminal or the agent has nothing left to do */
export function playGame(board: Board, agent: Agent, options: PlayOptions = {}): GameOutcome {
  const opening = options.openingMove === undefined ? { row: 0, col: 0 } : options.openingMove;
  const outcome: GameOutcome = {
    status: board.status,
    won: false,
    logicMoves: 0,
    guessMoves: 0,
    flagsSet: 0,
    actions: [],
  };

  if (opening && untouched(board)) board.reveal(opening);

  while (!board.isGameOver()) {
    const action = agent.chooseAction(board);
    if (!action) break;
    outcome.actions.push(action);

    if (action.kind === "flag") {
      board.flag(action.cell);
      outcome.logicMoves++;
      outcome.flagsSet++;
      continue;
    }

    board.reveal(action.cell);
    if (isLogicalAction(action)) outcome.logicMoves++;
    else outcome.guessMoves++;
  }

  outcome.status = board.status;
  outcome.won = board.hasWon();
  return outcome;
}
