/** Column names from the first input row, in file order. */
export type Header = string[];

/** Fields aligned positionally to the header; may be shorter than it. */
export type Row = string[];

export interface Table {
  header: Header;
  rows: Row[];
}

export type OutputMode = 'wide' | 'long';

/**
 * Column layout resolved once per run.
 * In long mode `dateStart` marks the first value column; everything before
 * it is metadata repeated on every emitted row.
 */
export type ColumnLayout =
  | { mode: 'wide'; header: Header; regionIdx: number }
  | { mode: 'long'; header: Header; regionIdx: number; dateStart: number };

export interface RunSummary {
  kept: number;
  total: number;
  outputPath: string;
}
