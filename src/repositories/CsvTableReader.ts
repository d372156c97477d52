import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { EmptyInputError, MalformedCsvError, mapFsError } from '../errors/AppErrors';
import { Row, Table } from '../models/Table';
import { ITableReader } from './interfaces';
// csv-parse/sync bundles its own CsvError class, so match on the code prefix
function isCsvError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('CSV_');
}
export class CsvTableReader implements ITableReader {
  read(filePath: string): Table {
    const text = this.readText(filePath);
    let records: Row[];
    try {
      records = parse(text, {
        bom: true,
        relax_column_count: true,
        relax_quotes: true
      });
    } catch (error) {
      if (isCsvError(error)) {
        throw new MalformedCsvError(filePath, error.message);
      }
      throw error;
    }
    const [header, ...rows] = records;
    if (!header) {
      throw new EmptyInputError(filePath);
    }
    return {
      header,
      rows
    };
  }

  // Invalid UTF-8 sequences decode to U+FFFD rather than failing the run
  private readText(filePath: string): string {
    let fd: number;
    try {
      fd = fs.openSync(filePath, 'r');
    } catch (error) {
      throw mapFsError(error, 'read', filePath);
    }
    try {
      return fs.readFileSync(fd).toString('utf8');
    } catch (error) {
      throw mapFsError(error, 'read', filePath);
    } finally {
      fs.closeSync(fd);
    }
  }
}
