// ─── Solver tests ──────────────────────────────────────────────────────────

import { describe, it, expect, vi } from "vitest";
import bunyan from "bunyan";
import {
  assessFrontier,
  createRng,
  deduceSinglePoint,
  enumerateComponent,
  partitionFrontier,
} from "../src/engine/index";
import type { Component, Constraint, Pos } from "../src/engine/index";
import { knowledgeFromPicture } from "./helpers";

const noRandom = () => 0;

function cellsInRow(row: number, from: number, count: number): Pos[] {
  return Array.from({ length: count }, (_, i) => ({ row, col: from + i }));
}

function constraint(vars: number[], required: number): Constraint {
  return { source: { row: 0, col: 0 }, vars, required };
}

// a + b = 1, a + b + c = 2, b + c = 1  →  a and c are mines
const oneTwoOne: Component = {
  cells: cellsInRow(0, 0, 3),
  constraints: [constraint([0, 1], 1), constraint([0, 1, 2], 2), constraint([1, 2], 1)],
};

// one mine among three cells
const oneOfThree: Component = {
  cells: cellsInRow(0, 0, 3),
  constraints: [constraint([0, 1, 2], 1)],
};

// x + y = 1, y + z = 1
const chain: Component = {
  cells: cellsInRow(0, 6, 3),
  constraints: [constraint([0, 1], 1), constraint([1, 2], 1)],
};

// ─── Single-point deduction ────────────────────────────────────────────────

describe("deduceSinglePoint", () => {
  it("flags the only covered neighbour of a 1", () => {
    const k = knowledgeFromPicture(["1.", "00"]);
    expect(deduceSinglePoint(k, noRandom)).toEqual({
      kind: "certain",
      action: { kind: "flag", cell: { row: 0, col: 1 }, reason: "single-point" },
    });
  });

  it("reveals around a number whose mines are all flagged", () => {
    const k = knowledgeFromPicture(["F1.", "11."]);
    expect(deduceSinglePoint(k, noRandom)).toEqual({
      kind: "certain",
      action: { kind: "reveal", cell: { row: 0, col: 2 }, reason: "single-point" },
    });
  });

  it("runs the mine pass over every number before the safe pass", () => {
    // (0,0) proves (0,1) safe, but (1,3) proves (0,3) is a mine
    const k = knowledgeFromPicture(["0.1.", "0011"]);
    expect(deduceSinglePoint(k, noRandom)).toEqual({
      kind: "certain",
      action: { kind: "flag", cell: { row: 0, col: 3 }, reason: "single-point" },
    });
  });

  it("guesses uniformly among covered cells when stuck", () => {
    const k = knowledgeFromPicture(["1.", ".."]);
    expect(deduceSinglePoint(k, () => 0)).toEqual({
      kind: "guess",
      action: { kind: "reveal", cell: { row: 0, col: 1 }, reason: "random" },
    });
    expect(deduceSinglePoint(k, () => 0.99)).toEqual({
      kind: "guess",
      action: { kind: "reveal", cell: { row: 1, col: 1 }, reason: "random" },
    });
  });

  it("returns none when nothing is covered", () => {
    const k = knowledgeFromPicture(["1F", "11"]);
    expect(deduceSinglePoint(k, noRandom)).toEqual({ kind: "none" });
  });
});

// ─── Frontier partition ────────────────────────────────────────────────────

describe("partitionFrontier", () => {
  const picture = ["...101...", "121101121"];

  it("splits independent regions into components", () => {
    const { frontier, components, dropped } = partitionFrontier(knowledgeFromPicture(picture));
    expect(frontier).toEqual([...cellsInRow(0, 0, 3), ...cellsInRow(0, 6, 3)]);
    expect(components).toHaveLength(2);
    expect(components[0].cells).toEqual(cellsInRow(0, 0, 3));
    expect(components[1].cells).toEqual(cellsInRow(0, 6, 3));
    expect(dropped).toBe(0);
  });

  it("attaches each number's constraint to its component", () => {
    const { components } = partitionFrontier(knowledgeFromPicture(picture));
    expect(components[0].constraints).toEqual([
      { source: { row: 0, col: 3 }, vars: [2], required: 1 },
      { source: { row: 1, col: 0 }, vars: [0, 1], required: 1 },
      { source: { row: 1, col: 1 }, vars: [0, 1, 2], required: 2 },
      { source: { row: 1, col: 2 }, vars: [1, 2], required: 1 },
      { source: { row: 1, col: 3 }, vars: [2], required: 1 },
    ]);
    expect(components[1].constraints.map((c) => c.source)).toEqual([
      { row: 0, col: 5 },
      { row: 1, col: 5 },
      { row: 1, col: 6 },
      { row: 1, col: 7 },
      { row: 1, col: 8 },
    ]);
    expect(components[1].constraints[3]).toEqual({
      source: { row: 1, col: 7 },
      vars: [0, 1, 2],
      required: 2,
    });
  });

  it("subtracts flagged neighbours from the requirement", () => {
    const { components } = partitionFrontier(knowledgeFromPicture(["F.", "2."]));
    expect(components).toEqual([
      {
        cells: [{ row: 0, col: 1 }, { row: 1, col: 1 }],
        constraints: [{ source: { row: 1, col: 0 }, vars: [0, 1], required: 1 }],
      },
    ]);
  });

  it("links cells that only share a number", () => {
    const { components } = partitionFrontier(knowledgeFromPicture([".1."]));
    expect(components).toHaveLength(1);
    expect(components[0].cells).toEqual([{ row: 0, col: 0 }, { row: 0, col: 2 }]);
  });

  it("is empty without revealed numbers next to covered cells", () => {
    expect(partitionFrontier(knowledgeFromPicture(["..", ".."])).components).toEqual([]);
    expect(partitionFrontier(knowledgeFromPicture(["00", "00"])).frontier).toEqual([]);
  });
});

// ─── Enumeration ───────────────────────────────────────────────────────────

describe("enumerateComponent", () => {
  it("finds the single model of a 1-2-1 pattern", () => {
    const result = enumerateComponent(oneTwoOne);
    expect(result.models).toBe(1);
    expect(result.mineModels).toEqual([1, 0, 1]);
    expect(result.probabilities).toEqual([1, 0, 1]);
  });

  it("reports the search it performed", () => {
    const result = enumerateComponent(oneTwoOne);
    expect(result.nodes).toBe(10);
    expect(result.pruned).toBe(5);
  });

  it("spreads one mine over three cells", () => {
    const result = enumerateComponent(oneOfThree);
    expect(result.models).toBe(3);
    expect(result.mineModels).toEqual([1, 1, 1]);
    expect(result.probabilities).toEqual([1 / 3, 1 / 3, 1 / 3]);
  });

  it("returns zero models for contradictory constraints", () => {
    const result = enumerateComponent({
      cells: cellsInRow(0, 0, 1),
      constraints: [constraint([0], 1), constraint([0], 0)],
    });
    expect(result.models).toBe(0);
    expect(result.probabilities).toEqual([0]);
  });

  it("agrees with a brute-force tally on random components", () => {
    const rng = createRng(2024);
    for (let trial = 0; trial < 60; trial++) {
      const n = 1 + Math.floor(rng() * 8);
      const hidden = Array.from({ length: n }, () => rng() < 0.4);
      const constraints: Constraint[] = [];
      const count = 1 + Math.floor(rng() * 4);
      for (let i = 0; i < count; i++) {
        const vars = Array.from({ length: n }, (_, v) => v).filter(() => rng() < 0.5);
        if (vars.length === 0) vars.push(Math.floor(rng() * n));
        constraints.push(constraint(vars, vars.filter((v) => hidden[v]).length));
      }
      const component: Component = { cells: cellsInRow(0, 0, n), constraints };

      let models = 0;
      const mineModels = new Array<number>(n).fill(0);
      for (let mask = 0; mask < 1 << n; mask++) {
        const ok = constraints.every(
          (c) => c.vars.filter((v) => (mask >> v) & 1).length === c.required,
        );
        if (!ok) continue;
        models++;
        for (let v = 0; v < n; v++) if ((mask >> v) & 1) mineModels[v]++;
      }

      const result = enumerateComponent(component);
      expect(result.models).toBe(models);
      expect(result.mineModels).toEqual(mineModels);
      expect(result.probabilities).toEqual(mineModels.map((m) => m / models));
    }
  });
});

// ─── Frontier assessment ───────────────────────────────────────────────────

describe("assessFrontier", () => {
  it("keeps independent components independent", () => {
    const together = assessFrontier([oneOfThree, chain], { maxComponentSize: 14 });
    const reversed = assessFrontier([chain, oneOfThree], { maxComponentSize: 14 });

    expect(together.enumerations[0].probabilities).toEqual(enumerateComponent(oneOfThree).probabilities);
    expect(together.enumerations[1].probabilities).toEqual(enumerateComponent(chain).probabilities);
    expect(reversed.enumerations[0].probabilities).toEqual([0.5, 0.5, 0.5]);
    expect(reversed.enumerations[1].probabilities).toEqual([1 / 3, 1 / 3, 1 / 3]);
  });

  it("picks the lowest probability, first encountered on ties", () => {
    const result = assessFrontier([chain, oneOfThree], { maxComponentSize: 14 });
    expect(result.certainMine).toBeNull();
    expect(result.certainSafe).toBeNull();
    expect(result.safest).toEqual({ cell: { row: 0, col: 0 }, probability: 1 / 3 });
  });

  it("stops at the first component that proves something", () => {
    const result = assessFrontier([oneTwoOne, chain], { maxComponentSize: 14 });
    expect(result.certainMine).toEqual({ row: 0, col: 0 });
    expect(result.certainSafe).toEqual({ row: 0, col: 1 });
    expect(result.enumerations).toHaveLength(1);
  });

  it("skips components above the size cap", () => {
    const result = assessFrontier([oneOfThree], { maxComponentSize: 2 });
    expect(result.skipped).toEqual([oneOfThree]);
    expect(result.enumerations).toEqual([]);
    expect(result.safest).toBeNull();
  });

  it("logs and ignores components without models", () => {
    const logger = bunyan.createLogger({ name: "test", level: "fatal" });
    const debug = vi.spyOn(logger, "debug");
    const broken: Component = {
      cells: cellsInRow(0, 0, 1),
      constraints: [constraint([0], 1), constraint([0], 0)],
    };

    const result = assessFrontier([broken, oneOfThree], { maxComponentSize: 14, logger });
    expect(result.enumerations.map((e) => e.models)).toEqual([0, 3]);
    expect(result.safest).toEqual({ cell: { row: 0, col: 0 }, probability: 1 / 3 });
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith({ first: { row: 0, col: 0 }, size: 1 }, "Component has no models");
  });
});
