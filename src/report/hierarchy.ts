import type { HierarchyRecord } from "./records.js";

/** Department name -> unique team names, both in first-seen order. */
export type Hierarchy = Map<string, Set<string>>;

export function buildHierarchy(records: Iterable<HierarchyRecord>): Hierarchy {
  const out: Hierarchy = new Map();
  for (const r of records) {
    let teams = out.get(r.department);
    if (!teams) {
      teams = new Set();
      out.set(r.department, teams);
    }
    teams.add(r.team);
  }
  return out;
}
