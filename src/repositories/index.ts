import { CsvTableReader } from './CsvTableReader';
import { CsvTableWriter } from './CsvTableWriter';
export const tableReader = new CsvTableReader();
export const tableWriter = new CsvTableWriter();
export * from './interfaces';
