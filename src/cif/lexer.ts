import { CifSyntaxError } from '../errors.js';

export type TokenType = 'data' | 'loop' | 'save' | 'global' | 'stop' | 'tag' | 'value';

export interface Token {
  type: TokenType;
  text: string;
  /** Value was quoted or a text field; never a number or unknown marker */
  quoted: boolean;
  line: number;
}

const WHITESPACE = /[ \t\r\n]/;

/**
 * Split CIF text into tokens.
 * Quotes only close when followed by whitespace or end of input, so
 * 'O'Brien' is a single value. Text fields run from a line starting with ';'
 * to the next line starting with ';'.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const src = text.replace(/^\uFEFF/, '');
  let pos = 0;
  let line = 1;
  let atLineStart = true;

  while (pos < src.length) {
    const ch = src[pos];

    if (ch === '\n') {
      line++;
      pos++;
      atLineStart = true;
      continue;
    }
    if (WHITESPACE.test(ch)) {
      pos++;
      atLineStart = false;
      continue;
    }
    if (ch === '#') {
      while (pos < src.length && src[pos] !== '\n') pos++;
      continue;
    }

    if (ch === ';' && atLineStart) {
      const startLine = line;
      const close = findTextFieldEnd(src, pos + 1);
      if (close === -1) {
        throw new CifSyntaxError('unterminated text field', startLine);
      }
      const body = src.slice(pos + 1, close).replace(/\r?\n$/, '');
      tokens.push({ type: 'value', text: trimLeadingNewline(body), quoted: true, line: startLine });
      line += countNewlines(src.slice(pos, close + 1));
      pos = close + 1;
      atLineStart = false;
      continue;
    }

    atLineStart = false;

    if (ch === "'" || ch === '"') {
      const end = findQuoteEnd(src, pos + 1, ch);
      if (end === -1) {
        throw new CifSyntaxError(`unterminated quoted value`, line);
      }
      tokens.push({ type: 'value', text: src.slice(pos + 1, end), quoted: true, line });
      pos = end + 1;
      continue;
    }

    let end = pos;
    while (end < src.length && !WHITESPACE.test(src[end])) end++;
    const word = src.slice(pos, end);
    tokens.push(classify(word, line));
    pos = end;
  }

  return tokens;
}

function classify(word: string, line: number): Token {
  const lower = word.toLowerCase();
  if (lower.startsWith('data_')) return { type: 'data', text: word.slice(5), quoted: false, line };
  if (lower.startsWith('save_')) return { type: 'save', text: word.slice(5), quoted: false, line };
  if (lower === 'loop_') return { type: 'loop', text: word, quoted: false, line };
  if (lower === 'global_') return { type: 'global', text: word, quoted: false, line };
  if (lower === 'stop_') return { type: 'stop', text: word, quoted: false, line };
  if (word.startsWith('_')) return { type: 'tag', text: word, quoted: false, line };
  return { type: 'value', text: word, quoted: false, line };
}

function findQuoteEnd(src: string, from: number, quote: string): number {
  for (let i = from; i < src.length; i++) {
    if (src[i] === '\n') return -1;
    if (src[i] === quote && (i + 1 === src.length || WHITESPACE.test(src[i + 1]))) {
      return i;
    }
  }
  return -1;
}

function findTextFieldEnd(src: string, from: number): number {
  let i = src.indexOf('\n', from);
  while (i !== -1) {
    if (src[i + 1] === ';') return i + 1;
    i = src.indexOf('\n', i + 1);
  }
  return -1;
}

function trimLeadingNewline(body: string): string {
  return body.replace(/^\r?\n/, '');
}

function countNewlines(s: string): number {
  let n = 0;
  for (const c of s) if (c === '\n') n++;
  return n;
}
