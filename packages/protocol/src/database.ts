export type ColumnType = "date" | "text" | "select" | "boolean" | "number";

export interface SelectOption {
  id: string;
  value: string;
  order: number;
  createdAt: string;
}

export interface DatabaseColumn {
  id: string;
  name: string;
  type: ColumnType;
  options: SelectOption[];
  order: number;
}

export type CellValue = string | number | boolean | null;

export interface DatabaseRow {
  id: string;
  values: Record<string, CellValue>;
}

/** A user-defined table living in a channel */
export interface Database {
  id: string;
  channelId: string;
  authorId: string;
  title: string;
  columns: DatabaseColumn[];
  rows: DatabaseRow[];
  createdAt: string;
  updatedAt: string;
}
