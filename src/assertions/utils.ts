import type { CifResult, RowLookup } from "../types/suite.js";
import { isLoopResult } from "../types/suite.js";

const MAX_SHOWN_LENGTH = 100;

/**
 * Shorten long values in diagnostics
 */
export function truncate(text: string, max = MAX_SHOWN_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Render row lookup conditions: "_atom_site.label=O1 AND _atom_site.part=2"
 */
export function describeLookup(lookups: readonly RowLookup[]): string {
  return lookups
    .map((l) => `${l.row_entry_name}=${String(l.row_entry_value)}`)
    .join(" AND ");
}

/**
 * Short name of a check, used to list outcomes
 */
export function labelOf(result: CifResult): string {
  if (isLoopResult(result)) {
    return `${result.test_type} ${result.cif_entry_name} [${describeLookup(result.row_lookup)}]`;
  }
  return `${result.test_type} ${result.cif_entry_name}`;
}

/**
 * Subject of a diagnostic sentence
 */
export function subjectOf(result: CifResult): string {
  if (isLoopResult(result)) {
    return `Loop entry '${result.cif_entry_name}' (where ${describeLookup(result.row_lookup)})`;
  }
  return `Entry '${result.cif_entry_name}'`;
}
