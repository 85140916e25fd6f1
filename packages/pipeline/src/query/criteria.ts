import type { EditedEntry, QueryCriteria } from "@scout-ledger/schema";

export type RowPredicate = (row: EditedEntry) => boolean;

/** Exact membership per field, AND across fields. An empty list admits nothing. */
export function buildFilterPredicate(criteria: QueryCriteria): RowPredicate {
  const predicates: RowPredicate[] = [];
  for (const field of ["match", "team"] as const) {
    const allowed = criteria[field];
    if (allowed !== undefined) {
      const members = new Set(allowed.map(Number));
      predicates.push((row) => members.has(row[field]));
    }
  }
  for (const field of ["name", "board", "edited"] as const) {
    const allowed = criteria[field];
    if (allowed !== undefined) {
      const members = new Set(allowed);
      predicates.push((row) => members.has(row[field]));
    }
  }
  return every(predicates);
}

/**
 * Relaxed matching: match and team by decimal prefix, name by case-insensitive substring,
 * OR within a field and AND across fields. Empty lists are ignored.
 */
export function buildSearchPredicate(criteria: QueryCriteria): RowPredicate {
  const predicates: RowPredicate[] = [];

  if (criteria.match && criteria.match.length > 0) {
    const prefixes = criteria.match.map(String);
    predicates.push((row) => prefixes.some((prefix) => String(row.match).startsWith(prefix)));
  }
  if (criteria.team && criteria.team.length > 0) {
    const prefixes = criteria.team.map(String);
    predicates.push((row) => prefixes.some((prefix) => String(row.team).startsWith(prefix)));
  }
  if (criteria.name && criteria.name.length > 0) {
    const needles = criteria.name.map((name) => name.toLowerCase());
    predicates.push((row) => {
      const haystack = row.name.toLowerCase();
      return needles.some((needle) => haystack.includes(needle));
    });
  }
  for (const field of ["board", "edited"] as const) {
    const allowed = criteria[field];
    if (allowed && allowed.length > 0) {
      const members = new Set(allowed);
      predicates.push((row) => members.has(row[field]));
    }
  }

  return every(predicates);
}

export function compareByMatchTeam(left: EditedEntry, right: EditedEntry): number {
  return left.match - right.match || left.team - right.team;
}

function every(predicates: readonly RowPredicate[]): RowPredicate {
  return (row) => predicates.every((predicate) => predicate(row));
}
