export { Board } from "./board";
export { Agent, isLogicalAction } from "./agent";
export { playGame } from "./play";
export { extractKnowledge, neighbourBuckets } from "./knowledge";
export { deduceSinglePoint } from "./deduction";
export { partitionFrontier } from "./frontier";
export { enumerateComponent, assessFrontier } from "./csp";
export { createRng, shuffle, pickRandom, resolveRandomSource } from "./rng";
export { neighbours, posKey, comparePos } from "./grid";
export type { RandomSource } from "./rng";
export type { Knowledge, NumberedCell, NeighbourBuckets } from "./knowledge";
export type { Deduction } from "./deduction";
export type { Constraint, Component, FrontierPartition } from "./frontier";
export type { ComponentEnumeration, FrontierAssessment, AssessOptions } from "./csp";
export type { GameOutcome, PlayOptions } from "./play";
export type {
  Action,
  ActionKind,
  ActionReason,
  AgentOptions,
  AgentStrategy,
  GameConfig,
  Pos,
} from "./types";
export { GameStatus, MINE, DEFAULT_CONFIG } from "./types";
