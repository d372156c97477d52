import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { InternalError, mapFsError } from '../errors/AppErrors';
import { Row } from '../models/Table';
import { IRowSink, ITableWriter } from './interfaces';
class CsvRowSink implements IRowSink {
  private closed = false;
  constructor(private readonly fd: number, private readonly filePath: string) {}
  write(row: Row): void {
    if (this.closed) {
      throw new InternalError(`Write after close: ${this.filePath}`);
    }
    try {
      fs.writeSync(this.fd, stringify([row], {
        record_delimiter: 'unix',
        // A bare CR splits the record for readers that treat it as a line break
        quoted_match: /\r/
      }));
    } catch (error) {
      throw mapFsError(error, 'write', this.filePath);
    }
  }
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.closeSync(this.fd);
    } catch (error) {
      throw mapFsError(error, 'write', this.filePath);
    }
  }
}
export class CsvTableWriter implements ITableWriter {
  open(filePath: string): IRowSink {
    try {
      fs.mkdirSync(path.dirname(filePath), {
        recursive: true
      });
      return new CsvRowSink(fs.openSync(filePath, 'w'), filePath);
    } catch (error) {
      throw mapFsError(error, 'write', filePath);
    }
  }
}
