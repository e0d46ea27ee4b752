import { CifSyntaxError } from '../errors.js';
import { CifDocument, deriveLoopName, type Row, type Table } from './document.js';
import { tokenize, type Token } from './lexer.js';
import { toCifValue, type CifValue } from './values.js';

/**
 * Parse the first data block of a CIF document.
 * Save frames and global blocks are skipped; later data blocks are ignored.
 */
export function parseCif(text: string): CifDocument {
  const tokens = tokenize(text);
  let i = skipPreamble(tokens);

  if (i >= tokens.length) {
    return CifDocument.empty();
  }

  const blockName = tokens[i].text;
  i++;

  const scalars = new Map<string, CifValue>();
  const tables: Table[] = [];
  const tableNames = new Set<string>();
  const seen = new Set<string>();

  const claim = (tag: Token) => {
    const name = tag.text.toLowerCase();
    if (seen.has(name)) {
      throw new CifSyntaxError(`duplicate entry ${tag.text}`, tag.line);
    }
    seen.add(name);
  };

  while (i < tokens.length) {
    const token = tokens[i];

    switch (token.type) {
      case 'data':
        // Only the first block is read
        return new CifDocument(blockName, scalars, tables);

      case 'global':
        throw new CifSyntaxError('global_ block inside a data block', token.line);

      case 'stop':
        i++;
        break;

      case 'save':
        i = skipSaveFrame(tokens, i);
        break;

      case 'tag': {
        const value = tokens[i + 1];
        if (!value || value.type !== 'value') {
          throw new CifSyntaxError(`entry ${token.text} has no value`, token.line);
        }
        claim(token);
        scalars.set(token.text, toCifValue(value.text, value.quoted));
        i += 2;
        break;
      }

      case 'loop': {
        const { table, next } = readLoop(tokens, i + 1, token.line, claim);
        let name = table.name;
        for (let n = 2; tableNames.has(name.toLowerCase()); n++) {
          name = `${table.name}#${n}`;
        }
        tableNames.add(name.toLowerCase());
        tables.push({ ...table, name });
        i = next;
        break;
      }

      case 'value':
        throw new CifSyntaxError(`value '${token.text}' without an entry name`, token.line);
    }
  }

  return new CifDocument(blockName, scalars, tables);
}

function skipPreamble(tokens: Token[]): number {
  let i = 0;
  while (i < tokens.length && tokens[i].type !== 'data') {
    if (tokens[i].type === 'global') {
      // Skip the global block up to the first data block
      while (i < tokens.length && tokens[i].type !== 'data') i++;
      break;
    }
    throw new CifSyntaxError('expected a data_ block header', tokens[i].line);
  }
  return i;
}

function skipSaveFrame(tokens: Token[], start: number): number {
  const open = tokens[start];
  if (open.text === '') {
    throw new CifSyntaxError('save_ terminator without an open frame', open.line);
  }
  for (let i = start + 1; i < tokens.length; i++) {
    if (tokens[i].type === 'save' && tokens[i].text === '') {
      return i + 1;
    }
  }
  throw new CifSyntaxError(`unterminated save frame ${open.text}`, open.line);
}

function readLoop(
  tokens: Token[],
  start: number,
  line: number,
  claim: (tag: Token) => void
): { table: Table; next: number } {
  let i = start;
  const columns: string[] = [];
  while (i < tokens.length && tokens[i].type === 'tag') {
    claim(tokens[i]);
    columns.push(tokens[i].text);
    i++;
  }
  if (columns.length === 0) {
    throw new CifSyntaxError('loop_ without column names', line);
  }

  const values: CifValue[] = [];
  while (i < tokens.length && tokens[i].type === 'value') {
    values.push(toCifValue(tokens[i].text, tokens[i].quoted));
    i++;
  }
  if (values.length % columns.length !== 0) {
    throw new CifSyntaxError(
      `loop ${deriveLoopName(columns)} has ${values.length} values for ${columns.length} columns`,
      line
    );
  }

  const rows: Row[] = [];
  for (let r = 0; r < values.length; r += columns.length) {
    const row: Record<string, CifValue> = {};
    columns.forEach((column, c) => {
      row[column] = values[r + c];
    });
    rows.push(row);
  }

  return { table: { name: deriveLoopName(columns), columns, rows }, next: i };
}
