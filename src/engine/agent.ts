import type Logger from "bunyan";
import { Action, AgentOptions, AgentStrategy, DEFAULT_CONFIG } from "./types";
import type { Board } from "./board";
import { extractKnowledge } from "./knowledge";
import { deduceSinglePoint } from "./deduction";
import { partitionFrontier } from "./frontier";
import { assessFrontier } from "./csp";
import { RandomSource, resolveRandomSource } from "./rng";

export function isLogicalAction(action: Action): boolean {
  return action.reason === "single-point" || action.reason === "csp-certain";
}

/**
 * Picks one action per call from the visible state of a board. The board is only read.
 *
 * With the "csp" strategy, a stalled single-point pass is upgraded to CSP
 * certainties or the lowest-risk reveal; "deduction" keeps the random guess.
 */
export class Agent {
  readonly strategy: AgentStrategy;
  readonly maxComponentSize: number;
  private readonly rng: RandomSource;
  private readonly log?: Logger;

  constructor(options: Partial<AgentOptions> = {}) {
    this.strategy = options.strategy ?? DEFAULT_CONFIG.strategy;
    this.maxComponentSize = options.maxComponentSize ?? DEFAULT_CONFIG.maxComponentSize;
    this.rng = resolveRandomSource(options.seed);
    this.log = options.logger?.child({ component: "agent", strategy: this.strategy });
  }

  chooseAction(board: Board): Action | null {
    const knowledge = extractKnowledge(board);
    const deduction = deduceSinglePoint(knowledge, this.rng);
    if (deduction.kind === "none") return null;
    if (deduction.kind === "certain" || this.strategy === "deduction") return deduction.action;

    const partition = partitionFrontier(knowledge);
    if (partition.components.length === 0) return deduction.action;
    if (partition.dropped > 0) {
      this.log?.debug({ dropped: partition.dropped }, "Constraints spanning components dropped");
    }

    const assessment = assessFrontier(partition.components, {
      maxComponentSize: this.maxComponentSize,
      logger: this.log,
    });
    if (assessment.certainMine) {
      return { kind: "flag", cell: assessment.certainMine, reason: "csp-certain" };
    }
    if (assessment.certainSafe) {
      return { kind: "reveal", cell: assessment.certainSafe, reason: "csp-certain" };
    }
    if (assessment.safest) {
      return {
        kind: "reveal",
        cell: assessment.safest.cell,
        reason: "csp-probability",
        probability: assessment.safest.probability,
      };
    }
    return deduction.action;
  }
}
