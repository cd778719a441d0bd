import type { Cell, Table, TableRecord } from "./schema";

// Builds a table from plain records. Column order follows the first appearance of each key.
export function tableFromRecords(records: readonly TableRecord[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows = records.map((record) => columns.map((column) => record[column] ?? null));
  return { columns, rows };
}

// When a name repeats, the first column carrying it wins.
export function tableToRecords(table: Table): TableRecord[] {
  return table.rows.map((row) => {
    const record: TableRecord = {};
    table.columns.forEach((column, index) => {
      if (!Object.hasOwn(record, column)) {
        record[column] = row[index] ?? null;
      }
    });
    return record;
  });
}

export function hasColumn(table: Table, name: string): boolean {
  return table.columns.includes(name);
}

export function columnIndexes(table: Table, name: string): number[] {
  const indexes: number[] = [];
  table.columns.forEach((column, index) => {
    if (column === name) indexes.push(index);
  });
  return indexes;
}

/**
 * Key used to compare cells in joins and de-duplication.
 * Cells match only when type and value both match; nulls match each other.
 */
export function cellKey(cell: Cell): string {
  if (cell === null) return "null";
  if (cell instanceof Date) return `date:${cell.getTime()}`;
  return `${typeof cell}:${String(cell)}`;
}

export function normalizeHeaders(table: Table): Table {
  return { columns: table.columns.map((column) => column.trim()), rows: table.rows };
}

/**
 * Keeps the listed columns in list order. Names the table does not carry are skipped;
 * a name carried more than once keeps every copy.
 */
export function selectColumns(table: Table, names: readonly string[]): Table {
  const indexes = names.flatMap((name) => columnIndexes(table, name));
  return {
    columns: indexes.map((index) => table.columns[index]),
    rows: table.rows.map((row) => indexes.map((index) => row[index] ?? null)),
  };
}

export function renameColumns(table: Table, renames: Readonly<Record<string, string>>): Table {
  return {
    columns: table.columns.map((column) => (Object.hasOwn(renames, column) ? renames[column] : column)),
    rows: table.rows,
  };
}

export function filterRows(table: Table, predicate: (row: readonly Cell[]) => boolean): Table {
  return { columns: table.columns, rows: table.rows.filter(predicate) };
}

// Drops every row whose value in `column` was already seen. No-op when the column is absent.
export function dropDuplicates(table: Table, column: string): Table {
  const index = table.columns.indexOf(column);
  if (index === -1) return table;

  const seen = new Set<string>();
  return filterRows(table, (row) => {
    const key = cellKey(row[index] ?? null);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export interface LeftJoinOptions {
  leftOn: string;
  rightOn: string;
}

const LEFT_SUFFIX = "_x";
const RIGHT_SUFFIX = "_y";

/**
 * Left join keeping every left row, in left order. A left row matching several right rows
 * is repeated once per match; an unmatched one gets nulls for the right-hand columns.
 * Names present on both sides, keys included, are suffixed `_x` (left) and `_y` (right).
 */
export function leftJoin(left: Table, right: Table, options: LeftJoinOptions): Table {
  const { leftOn, rightOn } = options;
  const leftKey = left.columns.indexOf(leftOn);
  const rightKey = right.columns.indexOf(rightOn);
  if (leftKey === -1) throw new Error(`Join column '${leftOn}' not found in left table`);
  if (rightKey === -1) throw new Error(`Join column '${rightOn}' not found in right table`);

  const rightNames = new Set(right.columns);
  const overlap = new Set(left.columns.filter((column) => rightNames.has(column)));

  const matchesByKey = new Map<string, number[]>();
  right.rows.forEach((row, rowIndex) => {
    const key = cellKey(row[rightKey] ?? null);
    const bucket = matchesByKey.get(key);
    if (bucket) {
      bucket.push(rowIndex);
    } else {
      matchesByKey.set(key, [rowIndex]);
    }
  });

  const emptyRight: Cell[] = right.columns.map(() => null);
  const rows: Cell[][] = [];
  for (const row of left.rows) {
    const matches = matchesByKey.get(cellKey(row[leftKey] ?? null));
    if (!matches) {
      rows.push([...row, ...emptyRight]);
      continue;
    }
    for (const match of matches) {
      const rightRow = right.rows[match];
      rows.push([...row, ...right.columns.map((_, index) => rightRow[index] ?? null)]);
    }
  }

  const columns = [
    ...left.columns.map((column) => (overlap.has(column) ? `${column}${LEFT_SUFFIX}` : column)),
    ...right.columns.map((column) => (overlap.has(column) ? `${column}${RIGHT_SUFFIX}` : column)),
  ];

  return { columns, rows };
}
