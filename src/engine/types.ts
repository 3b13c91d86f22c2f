import type Logger from "bunyan";
import type { RandomSource } from "./rng";

export interface Pos {
  row: number;
  col: number;
}

export enum GameStatus {
  InProgress = "in-progress",
  Won = "won",
  Lost = "lost",
}

/** Adjacency value stored for mine cells */
export const MINE = -1;

export type ActionKind = "flag" | "reveal";

// single-point and csp-certain are proven; the rest are guesses
export type ActionReason = "single-point" | "csp-certain" | "csp-probability" | "random";

export interface Action {
  kind: ActionKind;
  cell: Pos;
  reason: ActionReason;
  probability?: number; // estimated mine probability for csp-probability reveals
}

export type AgentStrategy = "deduction" | "csp";

export interface AgentOptions {
  strategy: AgentStrategy;
  maxComponentSize: number;
  seed?: number | RandomSource;
  logger?: Logger;
}

export interface GameConfig {
  rows: number;
  cols: number;
  mineCount: number;
  strategy: AgentStrategy;
  maxComponentSize: number;
}

/** Default config */
export const DEFAULT_CONFIG: GameConfig = {
  rows: 8,
  cols: 8,
  mineCount: 10,
  strategy: "csp",
  maxComponentSize: 14,
};
