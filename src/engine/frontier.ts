import type { Pos } from "./types";
import { comparePos, posKey } from "./grid";
import { Knowledge, neighbourBuckets } from "./knowledge";

export interface Constraint {
  source: Pos;      // numbered cell the constraint comes from
  vars: number[];   // indices into Component.cells
  required: number; // number minus flagged neighbours
}

export interface Component {
  cells: Pos[]; // row-major
  constraints: Constraint[];
}

export interface FrontierPartition {
  frontier: Pos[];
  components: Component[];
  dropped: number; // constraints spanning more than one component
}

interface RawConstraint {
  source: Pos;
  covered: Pos[];
  required: number;
}

export function partitionFrontier(knowledge: Knowledge): FrontierPartition {
  const raw: RawConstraint[] = [];
  const frontierByKey = new Map<string, Pos>();
  const adjacency = new Map<string, Set<string>>();

  for (const cell of knowledge.numbers.values()) {
    const { covered, flaggedCount } = neighbourBuckets(knowledge, cell);
    if (covered.length === 0) continue;
    raw.push({ source: { row: cell.row, col: cell.col }, covered, required: cell.value - flaggedCount });

    const keys = covered.map(posKey);
    covered.forEach((p, i) => {
      frontierByKey.set(keys[i], p);
      let links = adjacency.get(keys[i]);
      if (!links) {
        links = new Set();
        adjacency.set(keys[i], links);
      }
      for (const other of keys) {
        if (other !== keys[i]) links.add(other);
      }
    });
  }

  const frontier = Array.from(frontierByKey.values()).sort(comparePos);

  // Connected components, seeded in row-major order
  const componentOf = new Map<string, number>();
  const groups: Pos[][] = [];
  for (const start of frontier) {
    const startKey = posKey(start);
    if (componentOf.has(startKey)) continue;

    const id = groups.length;
    const members: Pos[] = [];
    const stack: string[] = [startKey];
    componentOf.set(startKey, id);
    while (stack.length > 0) {
      const key = stack.pop();
      if (key === undefined) break;
      const pos = frontierByKey.get(key);
      if (pos) members.push(pos);
      for (const next of adjacency.get(key) ?? []) {
        if (componentOf.has(next)) continue;
        componentOf.set(next, id);
        stack.push(next);
      }
    }
    groups.push(members.sort(comparePos));
  }

  const components: Component[] = groups.map((cells) => ({ cells, constraints: [] }));
  const indexInComponent = new Map<string, number>();
  for (const comp of components) {
    comp.cells.forEach((p, i) => indexInComponent.set(posKey(p), i));
  }

  let dropped = 0;
  for (const c of raw) {
    const ids = new Set(c.covered.map((p) => componentOf.get(posKey(p))));
    const [id] = ids;
    if (ids.size !== 1 || id === undefined) {
      dropped++;
      continue;
    }
    const vars: number[] = [];
    for (const p of c.covered) {
      const idx = indexInComponent.get(posKey(p));
      if (idx !== undefined) vars.push(idx);
    }
    components[id].constraints.push({ source: c.source, vars, required: c.required });
  }

  return { frontier, components, dropped };
}
