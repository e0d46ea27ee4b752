export type UnknownMarker = '?' | '.';

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
  /** Standard uncertainty, when written as 1.234(5) */
  readonly su?: number;
  readonly raw: string;
}

export interface TextValue {
  readonly kind: 'text';
  readonly value: string;
}

/**
 * '?' (not determined) or '.' (inapplicable); the entry exists but has no value
 */
export interface UnknownValue {
  readonly kind: 'unknown';
  readonly marker: UnknownMarker;
}

export type CifValue = NumberValue | TextValue | UnknownValue;

/** Literal value as written in a suite file */
export type Literal = string | number | boolean;

const NUMERIC = /^([+-]?(?:\d+\.?\d*|\.\d+))(?:[eE]([+-]?\d+))?(?:\((\d+)\))?$/;

/**
 * Parse a numeric CIF token, including an optional standard uncertainty
 */
export function parseNumber(token: string): { value: number; su?: number } | undefined {
  const match = token.match(NUMERIC);
  if (!match) return undefined;

  const [, mantissa, exponent, suDigits] = match;
  const exp = exponent ? parseInt(exponent, 10) : 0;
  const value = Number(`${mantissa}e${exp}`);
  if (!Number.isFinite(value)) return undefined;

  if (suDigits === undefined) {
    return { value };
  }
  const dot = mantissa.indexOf('.');
  const decimals = dot === -1 ? 0 : mantissa.length - dot - 1;
  return { value, su: Number(`${suDigits}e${exp - decimals}`) };
}

/**
 * Build a typed value from a lexer token. Quoted tokens are always text.
 */
export function toCifValue(token: string, quoted: boolean): CifValue {
  if (!quoted) {
    if (token === '?') return { kind: 'unknown', marker: '?' };
    if (token === '.') return { kind: 'unknown', marker: '.' };
    const parsed = parseNumber(token);
    if (parsed) {
      return parsed.su === undefined
        ? { kind: 'number', value: parsed.value, raw: token }
        : { kind: 'number', value: parsed.value, su: parsed.su, raw: token };
    }
  }
  return { kind: 'text', value: token };
}

/**
 * Numeric reading of a value; text counts when it is a clean numeric literal
 */
export function toNumber(value: CifValue): number | undefined {
  switch (value.kind) {
    case 'number':
      return value.value;
    case 'text':
      return parseNumber(value.value.trim())?.value;
    case 'unknown':
      return undefined;
  }
}

/**
 * Source text of a value
 */
export function textOf(value: CifValue): string {
  switch (value.kind) {
    case 'number':
      return value.raw;
    case 'text':
      return value.value;
    case 'unknown':
      return value.marker;
  }
}

/**
 * Type-aware equality between a document value and a suite literal.
 * Numbers compare numerically ("1.0" equals 1), strings compare verbatim
 * against the source text, booleans compare against the text "true"/"false".
 */
export function equalsLiteral(value: CifValue, literal: Literal): boolean {
  if (typeof literal === 'number') {
    return toNumber(value) === literal;
  }
  if (typeof literal === 'boolean') {
    return value.kind === 'text' && value.value === String(literal);
  }
  return textOf(value) === literal;
}

export function isUnknown(value: CifValue): value is UnknownValue {
  return value.kind === 'unknown';
}

/**
 * Render a number for diagnostics without float noise (10.2339, not 10.233899999999998)
 */
export function formatNumber(n: number): string {
  return String(Number(n.toPrecision(12)));
}

export function formatValue(value: CifValue): string {
  return value.kind === 'text' ? `'${value.value}'` : textOf(value);
}

export function formatLiteral(literal: Literal): string {
  return typeof literal === 'string' ? `'${literal}'` : String(literal);
}
