import type {
  CellValue,
  ColumnType,
  Database,
  DatabaseColumn,
  DatabaseRow,
  SelectOption,
} from "@atrium/protocol";
import { errors } from "../lib/errors.js";
import { newId } from "../lib/ids.js";

export interface OptionInput {
  id?: string;
  value: string;
  order?: number;
}

export interface ColumnInput {
  id?: string;
  name: string;
  type: ColumnType;
  options?: OptionInput[];
  order?: number;
}

export interface ColumnUpdate {
  name?: string;
  type?: ColumnType;
  order?: number;
  /** Required when a column becomes select */
  options?: OptionInput[];
}

export interface OptionUpdate {
  value?: string;
  order?: number;
}

/** Document with an updated element of interest, so routes can answer with it */
export interface Change<T> {
  doc: Database;
  item: T;
}

function buildOptions(inputs: OptionInput[], now: string): SelectOption[] {
  return inputs.map((o, i) => ({ id: o.id ?? newId(), value: o.value, order: o.order ?? i, createdAt: now }));
}

/** Assign ids and orders; select columns must start with at least one option */
export function buildColumns(inputs: ColumnInput[], now = new Date().toISOString()): DatabaseColumn[] {
  return inputs.map((c, i) => {
    const options = c.options ?? [];
    if (c.type === "select" && options.length === 0) {
      throw errors.badRequest(`Select column "${c.name}" requires at least one option`);
    }
    return {
      id: c.id ?? newId(),
      name: c.name,
      type: c.type,
      options: c.type === "select" ? buildOptions(options, now) : [],
      order: c.order ?? i,
    };
  });
}

function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}/.test(value) && !Number.isNaN(Date.parse(value));
}

function cellMatches(column: DatabaseColumn, value: CellValue): boolean {
  if (value === null) return true;
  switch (column.type) {
    case "text":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "date":
      return typeof value === "string" && isIsoDate(value);
    case "select":
      return typeof value === "string" && column.options.some((o) => o.id === value);
  }
}

/** Every key must name a column and every value must suit that column's type */
export function validateRowValues(
  columns: DatabaseColumn[],
  values: Record<string, CellValue>
): Record<string, CellValue> {
  for (const [columnId, value] of Object.entries(values)) {
    const column = columns.find((c) => c.id === columnId);
    if (!column) {
      throw errors.badRequest(`Unknown column ${columnId}`);
    }
    if (!cellMatches(column, value)) {
      throw errors.badRequest(`Invalid value for ${column.type} column "${column.name}"`);
    }
  }
  return values;
}

/** Drop values whose column no longer exists */
function pruneRows(rows: DatabaseRow[], columns: DatabaseColumn[]): DatabaseRow[] {
  const ids = new Set(columns.map((c) => c.id));
  return rows.map((row) => ({
    id: row.id,
    values: Object.fromEntries(Object.entries(row.values).filter(([columnId]) => ids.has(columnId))),
  }));
}

function clearColumnValues(rows: DatabaseRow[], columnId: string, predicate: (v: CellValue) => boolean = () => true): DatabaseRow[] {
  return rows.map((row) => {
    if (!(columnId in row.values) || !predicate(row.values[columnId])) return row;
    const { [columnId]: _removed, ...rest } = row.values;
    return { id: row.id, values: rest };
  });
}

export function replaceColumns(doc: Database, inputs: ColumnInput[]): Database {
  const columns = buildColumns(inputs);
  return { ...doc, columns, rows: pruneRows(doc.rows, columns) };
}

export function findRow(doc: Database, rowId: string): DatabaseRow {
  const row = doc.rows.find((r) => r.id === rowId);
  if (!row) throw errors.notFound("Row");
  return row;
}

export function addRow(doc: Database, values: Record<string, CellValue>): Change<DatabaseRow> {
  const row: DatabaseRow = { id: newId(), values: validateRowValues(doc.columns, values) };
  return { doc: { ...doc, rows: [...doc.rows, row] }, item: row };
}

export function updateRow(doc: Database, rowId: string, values: Record<string, CellValue>): Change<DatabaseRow> {
  findRow(doc, rowId);
  const row: DatabaseRow = { id: rowId, values: validateRowValues(doc.columns, values) };
  return { doc: { ...doc, rows: doc.rows.map((r) => (r.id === rowId ? row : r)) }, item: row };
}

export function deleteRow(doc: Database, rowId: string): Database {
  findRow(doc, rowId);
  return { ...doc, rows: doc.rows.filter((r) => r.id !== rowId) };
}

export function findColumn(doc: Database, columnId: string): DatabaseColumn {
  const column = doc.columns.find((c) => c.id === columnId);
  if (!column) throw errors.notFound("Column");
  return column;
}

/**
 * Renames, reorders or retypes a column. A type change clears the column's
 * row values; leaving `select` also clears its options.
 */
export function updateColumn(doc: Database, columnId: string, update: ColumnUpdate): Change<DatabaseColumn> {
  const current = findColumn(doc, columnId);
  const type = update.type ?? current.type;
  let options: SelectOption[] = [];
  if (type === "select") {
    options = update.options ? buildOptions(update.options, new Date().toISOString()) : current.options;
    if (options.length === 0) {
      throw errors.badRequest(`Select column "${update.name ?? current.name}" requires at least one option`);
    }
  }

  const column: DatabaseColumn = {
    ...current,
    name: update.name ?? current.name,
    order: update.order ?? current.order,
    type,
    options,
  };
  let rows = doc.rows;
  if (type !== current.type) {
    rows = clearColumnValues(rows, columnId);
  } else if (update.options) {
    rows = clearColumnValues(rows, columnId, (v) => !options.some((o) => o.id === v));
  }
  return {
    doc: { ...doc, columns: doc.columns.map((c) => (c.id === columnId ? column : c)), rows },
    item: column,
  };
}

export function deleteColumn(doc: Database, columnId: string): Database {
  findColumn(doc, columnId);
  return {
    ...doc,
    columns: doc.columns.filter((c) => c.id !== columnId),
    rows: clearColumnValues(doc.rows, columnId),
  };
}

function findSelectColumn(doc: Database, columnId: string): DatabaseColumn {
  const column = findColumn(doc, columnId);
  if (column.type !== "select") {
    throw errors.badRequest("Options are only available on select columns");
  }
  return column;
}

function withColumn(doc: Database, column: DatabaseColumn): Database {
  return { ...doc, columns: doc.columns.map((c) => (c.id === column.id ? column : c)) };
}

export function findOption(doc: Database, columnId: string, optionId: string): SelectOption {
  const option = findSelectColumn(doc, columnId).options.find((o) => o.id === optionId);
  if (!option) throw errors.notFound("Option");
  return option;
}

export function addOption(doc: Database, columnId: string, input: OptionInput): Change<SelectOption> {
  const column = findSelectColumn(doc, columnId);
  const option: SelectOption = {
    id: newId(),
    value: input.value,
    order: input.order ?? column.options.length,
    createdAt: new Date().toISOString(),
  };
  return { doc: withColumn(doc, { ...column, options: [...column.options, option] }), item: option };
}

export function updateOption(
  doc: Database,
  columnId: string,
  optionId: string,
  update: OptionUpdate
): Change<SelectOption> {
  const column = findSelectColumn(doc, columnId);
  const current = findOption(doc, columnId, optionId);
  const option: SelectOption = {
    ...current,
    value: update.value ?? current.value,
    order: update.order ?? current.order,
  };
  return {
    doc: withColumn(doc, { ...column, options: column.options.map((o) => (o.id === optionId ? option : o)) }),
    item: option,
  };
}

/** Removing an option also clears the cells that selected it */
export function deleteOption(doc: Database, columnId: string, optionId: string): Database {
  const column = findSelectColumn(doc, columnId);
  findOption(doc, columnId, optionId);
  const next = withColumn(doc, { ...column, options: column.options.filter((o) => o.id !== optionId) });
  return { ...next, rows: clearColumnValues(next.rows, columnId, (v) => v === optionId) };
}
