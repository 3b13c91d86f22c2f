import type Logger from "bunyan";
import type { Pos } from "./types";
import type { Component } from "./frontier";

export interface ComponentEnumeration {
  component: Component;
  models: number;
  mineModels: number[];    // per cell: models in which the cell is a mine
  probabilities: number[]; // per cell: mineModels / models
  nodes: number;           // assignments tried
  pruned: number;          // assignments rejected by bounds
}

export interface FrontierAssessment {
  certainMine: Pos | null;
  certainSafe: Pos | null;
  safest: { cell: Pos; probability: number } | null;
  enumerations: ComponentEnumeration[];
  skipped: Component[];
}

export interface AssessOptions {
  maxComponentSize: number;
  logger?: Logger;
}

const UNASSIGNED = -1;
const SAFE = 0;
const MINE = 1;

/**
 * Count every mine/safe assignment of a component that satisfies all of its
 * constraints. Depth-first over the cells in order with an explicit stack:
 * `choice[d]` holds the value currently assigned at depth d, and each cell
 * tries mine first, then safe.
 */
export function enumerateComponent(component: Component): ComponentEnumeration {
  const n = component.cells.length;
  const constraints = component.constraints;
  const required = constraints.map((c) => c.required);
  const mines = new Array<number>(constraints.length).fill(0);
  const unassigned = constraints.map((c) => c.vars.length);
  const varToConstraints = Array.from({ length: n }, () => [] as number[]);
  constraints.forEach((c, ci) => {
    for (const v of c.vars) varToConstraints[v].push(ci);
  });

  const choice = new Array<number>(n).fill(UNASSIGNED);
  const mineModels = new Array<number>(n).fill(0);
  let models = 0;
  let nodes = 0;
  let pruned = 0;

  function assign(v: number, value: number): void {
    choice[v] = value;
    for (const ci of varToConstraints[v]) {
      unassigned[ci]--;
      if (value === MINE) mines[ci]++;
    }
  }

  function unassign(v: number): void {
    const value = choice[v];
    choice[v] = UNASSIGNED;
    for (const ci of varToConstraints[v]) {
      unassigned[ci]++;
      if (value === MINE) mines[ci]--;
    }
  }

  // Only constraints touching v changed since the last consistent state
  function consistent(v: number): boolean {
    for (const ci of varToConstraints[v]) {
      if (mines[ci] > required[ci]) return false;
      if (mines[ci] + unassigned[ci] < required[ci]) return false;
    }
    return true;
  }

  function satisfiesAll(): boolean {
    for (let ci = 0; ci < constraints.length; ci++) {
      if (mines[ci] !== required[ci]) return false;
    }
    return true;
  }

  let depth = 0;
  while (depth >= 0) {
    if (depth === n) {
      if (satisfiesAll()) {
        models++;
        for (let i = 0; i < n; i++) {
          if (choice[i] === MINE) mineModels[i]++;
        }
      }
      depth--;
      continue;
    }

    const previous = choice[depth];
    if (previous !== UNASSIGNED) unassign(depth);
    if (previous === SAFE) {
      depth--;
      continue;
    }

    assign(depth, previous === UNASSIGNED ? MINE : SAFE);
    nodes++;
    if (consistent(depth)) depth++;
    else pruned++;
  }

  const probabilities = mineModels.map((m) => (models > 0 ? m / models : 0));
  return { component, models, mineModels, probabilities, nodes, pruned };
}

/**
 * Enumerate components in order and pick the move they support: the first proven
 * mine, else the first proven safe cell, else the lowest mine probability seen.
 * Stops after the first component that proves anything.
 */
export function assessFrontier(components: Component[], options: AssessOptions): FrontierAssessment {
  const { maxComponentSize, logger } = options;
  const enumerations: ComponentEnumeration[] = [];
  const skipped: Component[] = [];
  let certainMine: Pos | null = null;
  let certainSafe: Pos | null = null;
  let safest: { cell: Pos; probability: number } | null = null;

  for (const component of components) {
    if (component.cells.length > maxComponentSize) {
      logger?.debug({ size: component.cells.length, maxComponentSize }, "Component too large, skipped");
      skipped.push(component);
      continue;
    }
    if (component.constraints.length === 0) {
      skipped.push(component);
      continue;
    }

    const result = enumerateComponent(component);
    enumerations.push(result);
    if (result.models === 0) {
      logger?.debug({ first: component.cells[0], size: component.cells.length }, "Component has no models");
      continue;
    }

    for (let i = 0; i < component.cells.length; i++) {
      const cell = component.cells[i];
      const p = result.probabilities[i];
      if (p === 1 && certainMine === null) certainMine = cell;
      if (p === 0 && certainSafe === null) certainSafe = cell;
      if (safest === null || p < safest.probability) safest = { cell, probability: p };
    }

    if (certainMine !== null || certainSafe !== null) break;
  }

  return { certainMine, certainSafe, safest, enumerations, skipped };
}
