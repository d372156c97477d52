import { Row, Table } from '../models/Table';

/**
 * Repository Interfaces
 *
 * The filter service only sees these contracts, so tests can hand it
 * in-memory tables instead of files.
 */

// ============================================================================
// TABLE READER
// ============================================================================
export interface ITableReader {
  /** Reads the whole table; the first record becomes the header. */
  read(filePath: string): Table;
}

// ============================================================================
// TABLE WRITER
// ============================================================================
export interface IRowSink {
  write(row: Row): void;
  close(): void;
}
export interface ITableWriter {
  /** Creates parent directories and truncates any existing file. */
  open(filePath: string): IRowSink;
}
