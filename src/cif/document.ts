import { equalsLiteral, type CifValue, type Literal } from './values.js';

/** One loop row, keyed by column name as written in the source */
export type Row = Readonly<Record<string, CifValue>>;

export interface Table {
  readonly name: string;
  readonly columns: readonly string[];
  /** Source order; first-match lookups depend on it */
  readonly rows: readonly Row[];
}

export interface RowCondition {
  name: string;
  value: Literal;
}

/**
 * Parsed output document: scalar entries plus loop tables.
 * Names are looked up case-insensitively, as CIF tags are.
 */
export class CifDocument {
  readonly blockName: string;
  private readonly scalars: ReadonlyMap<string, CifValue>;
  private readonly tables: ReadonlyMap<string, Table>;
  private readonly tablesByColumn: ReadonlyMap<string, Table>;

  constructor(blockName: string, scalars: Map<string, CifValue>, tables: Table[]) {
    this.blockName = blockName;
    this.scalars = new Map([...scalars].map(([name, value]) => [key(name), value]));

    const byName = new Map<string, Table>();
    const byColumn = new Map<string, Table>();
    for (const table of tables) {
      const frozen: Table = Object.freeze({
        name: table.name,
        columns: Object.freeze([...table.columns]),
        rows: Object.freeze(table.rows.map((row) => Object.freeze({ ...row }))),
      });
      byName.set(key(table.name), frozen);
      for (const column of table.columns) {
        byColumn.set(key(column), frozen);
      }
    }
    this.tables = byName;
    this.tablesByColumn = byColumn;
    Object.freeze(this);
  }

  static empty(): CifDocument {
    return new CifDocument('', new Map(), []);
  }

  get scalarNames(): string[] {
    return [...this.scalars.keys()];
  }

  get tableNames(): string[] {
    return [...this.tables.values()].map((t) => t.name);
  }

  /**
   * Value of a non-looped entry
   */
  getScalar(name: string): CifValue | undefined {
    return this.scalars.get(key(name));
  }

  getTable(name: string): Table | undefined {
    return this.tables.get(key(name));
  }

  /**
   * Table that owns the given column
   */
  tableOf(column: string): Table | undefined {
    return this.tablesByColumn.get(key(column));
  }

  /**
   * True if the name is a scalar entry or a loop column
   */
  has(name: string): boolean {
    return this.scalars.has(key(name)) || this.tablesByColumn.has(key(name));
  }

  /**
   * All rows matching every condition, in document order.
   * A condition on a column the table does not have matches nothing.
   */
  findRows(tableName: string, conditions: readonly RowCondition[]): Row[] {
    const table = this.getTable(tableName);
    if (!table) return [];

    const resolved: Array<{ column: string; value: Literal }> = [];
    for (const condition of conditions) {
      const column = findColumn(table, condition.name);
      if (column === undefined) return [];
      resolved.push({ column, value: condition.value });
    }

    return table.rows.filter((row) =>
      resolved.every(({ column, value }) => {
        const cell = row[column];
        return cell !== undefined && equalsLiteral(cell, value);
      })
    );
  }

  getCell(tableName: string, row: Row, column: string): CifValue | undefined {
    const table = this.getTable(tableName);
    if (!table) return undefined;
    const resolved = findColumn(table, column);
    return resolved === undefined ? undefined : row[resolved];
  }
}

function key(name: string): string {
  return name.toLowerCase();
}

function findColumn(table: Table, name: string): string | undefined {
  const wanted = key(name);
  return table.columns.find((c) => key(c) === wanted);
}

/**
 * Name a loop after its category: the part before '.' for dotted tags,
 * otherwise the longest '_'-separated prefix shared by all columns.
 */
export function deriveLoopName(columns: readonly string[]): string {
  const first = columns[0];
  const dot = first.indexOf('.');
  if (dot > 0) {
    return first.slice(0, dot);
  }

  const segments = columns.map((c) => c.slice(1).split('_'));
  const shortest = Math.min(...segments.map((s) => s.length));
  // A single column names itself minus its last segment
  const limit = columns.length === 1 ? shortest - 1 : shortest;
  const prefix: string[] = [];
  for (let i = 0; i < limit; i++) {
    const segment = segments[0][i];
    if (segments.every((s) => s[i] === segment)) {
      prefix.push(segment);
    } else {
      break;
    }
  }

  const joined = prefix.join('_');
  return joined.length > 0 ? `_${joined}` : first;
}
