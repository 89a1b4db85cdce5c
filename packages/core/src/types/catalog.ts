/**
 * Catalog and record types shared by the console services
 */

/**
 * A result row keyed by column name
 */
export type Row = Record<string, unknown>;

/**
 * Column metadata from information_schema.columns
 */
export interface ColumnInfo {
  name: string;
  /** information_schema data_type, e.g. "integer", "character varying" */
  type: string;
  nullable: boolean;
  default: string | null;
}

/**
 * A single-column foreign key in another table pointing at this one
 */
export interface ForeignKeyReference {
  /** Referencing table */
  table: string;
  /** Referencing column */
  column: string;
  /** Column of the referenced table */
  referencedColumn: string;
  deleteRule: string;
}

export interface TableSummary {
  name: string;
  rowCount: number;
  columns: string[];
}

export interface TablePage {
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
  data: Row[];
  columns: string[];
  sortColumn: string;
}

/**
 * Equality conditions joined with AND
 */
export type Condition = Record<string, unknown>;
