import type { CifValue } from '../cif/values.js';
import type { OutcomeKind } from '../types/result.js';

export type LookupFailureKind = Extract<OutcomeKind, 'entry-missing' | 'row-not-found' | 'column-not-found'>;

/**
 * Outcome of locating the value a check is about
 */
export type Resolution =
  | { found: true; value: CifValue }
  | { found: false; kind: LookupFailureKind; detail: string };
