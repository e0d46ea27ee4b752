import type { CifDocument, RowCondition } from '../cif/document.js';
import type { CifLoopValueResult, CifResult, CifValueResult } from '../types/suite.js';
import { isLoopResult } from '../types/suite.js';
import type { Resolution } from './types.js';
import { describeLookup } from './utils.js';

/**
 * Locate the value a check refers to
 */
export function resolveEntry(result: CifResult, document: CifDocument): Resolution {
  return isLoopResult(result)
    ? resolveLoopEntry(result, document)
    : resolveScalarEntry(result, document);
}

function resolveScalarEntry(result: CifValueResult, document: CifDocument): Resolution {
  const name = result.cif_entry_name;
  const value = document.getScalar(name);
  if (value) {
    return { found: true, value };
  }

  const table = document.tableOf(name);
  return {
    found: false,
    kind: 'entry-missing',
    detail: table
      ? `Entry '${name}' is a column of loop '${table.name}', not a single value`
      : `Entry '${name}' not found`,
  };
}

/**
 * The table is the one holding the first lookup column. With several
 * matching rows the first in document order is used.
 */
function resolveLoopEntry(result: CifLoopValueResult, document: CifDocument): Resolution {
  const [first] = result.row_lookup;
  const table = document.tableOf(first.row_entry_name);
  if (!table) {
    return {
      found: false,
      kind: 'row-not-found',
      detail: `No loop contains lookup column '${first.row_entry_name}'`,
    };
  }

  const conditions: RowCondition[] = result.row_lookup.map((l) => ({
    name: l.row_entry_name,
    value: l.row_entry_value,
  }));
  const [row] = document.findRows(table.name, conditions);
  if (!row) {
    return {
      found: false,
      kind: 'row-not-found',
      detail: `No row in loop '${table.name}' where ${describeLookup(result.row_lookup)}`,
    };
  }

  const value = document.getCell(table.name, row, result.cif_entry_name);
  if (!value) {
    return {
      found: false,
      kind: 'column-not-found',
      detail: `Column '${result.cif_entry_name}' not found in loop '${table.name}'`,
    };
  }
  return { found: true, value };
}
