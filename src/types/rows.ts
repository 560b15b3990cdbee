/**
 * Row and document data types
 */

/**
 * A spreadsheet cell, resolved once when the row is read
 */
export type CellValue =
  | { kind: "text"; text: string }
  | { kind: "number"; value: number }
  | { kind: "date"; value: Date }
  | { kind: "empty" };

/** Header → cell, one per input record */
export type SourceRow = ReadonlyMap<string, CellValue>;

export interface LutIndex {
  joinColumn: string;
  /** Trimmed join key → auxiliary row */
  records: ReadonlyMap<string, SourceRow>;
  loaded: number;
  skipped: number;
}

export interface OutputElement {
  name: string;
  value: string;
}

export interface OutputRecord {
  rowType: string;
  elements: OutputElement[];
}

export type OutputDocument = OutputRecord[];

export interface WorksheetData {
  headers: string[];
  /** Non-blank data rows, in sheet order */
  rows: SourceRow[];
  /** Sheet row number of each entry in `rows` */
  rowNumbers: number[];
}
