#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { InvalidArgumentError, program } from "commander";
import log from "./logger";
import config from "./config";
import { Agent, AgentStrategy, Board, DEFAULT_CONFIG, playGame } from "./engine";

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parseStrategy(value: string): AgentStrategy {
  if (value === "deduction" || value === "csp") return value;
  throw new InvalidArgumentError(`Unknown agent "${value}" (use deduction or csp)`);
}

interface PlayCommandOptions {
  rows: number;
  cols: number;
  mines: number;
  seed?: number;
  agent: AgentStrategy;
  maxComponentSize: number;
}

program
  .name("minesweeper-agent")
  .description("Minesweeper board with a deduction and CSP-probability agent")
  .version("0.1.0", "-v, --version");

program
  .command("play")
  .description("Play one game with the agent and report the outcome")
  .option("-r, --rows <n>", "Board rows", parseCount, DEFAULT_CONFIG.rows)
  .option("-c, --cols <n>", "Board columns", parseCount, DEFAULT_CONFIG.cols)
  .option("-m, --mines <n>", "Number of mines", parseCount, DEFAULT_CONFIG.mineCount)
  .option("-s, --seed <n>", "Seed for the board and the agent", parseCount)
  .option("-a, --agent <strategy>", "deduction or csp", parseStrategy, DEFAULT_CONFIG.strategy)
  .option("--max-component-size <n>", "Largest frontier component to enumerate", parseCount, config.maxComponentSize)
  .action((opts: PlayCommandOptions) => {
    let board: Board;
    try {
      board = new Board(opts.rows, opts.cols, opts.mines, opts.seed);
    } catch (err) {
      log.error({ err }, "Invalid board");
      process.exitCode = 1;
      return;
    }

    // The agent gets its own stream so its guesses never shift the layout
    const agent = new Agent({
      strategy: opts.agent,
      maxComponentSize: opts.maxComponentSize,
      seed: opts.seed === undefined ? undefined : opts.seed + 1,
      logger: log,
    });
    const outcome = playGame(board, agent);

    log.info(
      {
        rows: opts.rows,
        cols: opts.cols,
        mines: opts.mines,
        seed: opts.seed,
        agent: opts.agent,
        status: outcome.status,
        logicMoves: outcome.logicMoves,
        guessMoves: outcome.guessMoves,
        flagsSet: outcome.flagsSet,
      },
      `Game ${outcome.status}`,
    );
  });

program.parse();
