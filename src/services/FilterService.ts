import path from 'path';
import { FilterOptions } from '../models/FilterOptions';
import { RunSummary } from '../models/Table';
import { IRowSink, ITableReader, ITableWriter } from '../repositories/interfaces';
import { logger } from '../utils/logger';
import { CityMatcher } from './CityMatcher';
import { resolveLayout } from './ColumnResolver';
import { outputHeader, reshapeRow } from './Reshaper';
export class FilterService {
  private tableReader: ITableReader;
  private tableWriter: ITableWriter;
  constructor(tableReader: ITableReader, tableWriter: ITableWriter) {
    this.tableReader = tableReader;
    this.tableWriter = tableWriter;
  }

  /**
   * Keeps rows whose RegionName matches a requested city and writes them,
   * pivoted to Date/Value rows when `options.long` is set.
   *
   * Columns are resolved before the output is opened, so a missing
   * RegionName or date boundary leaves any existing output untouched.
   */
  run(options: FilterOptions): RunSummary {
    const matcher = new CityMatcher(options.cities);
    for (const { requested, corrected } of matcher.getCorrections()) {
      logger.warn({ requested, corrected }, 'Corrected misspelled city name');
    }
    const table = this.tableReader.read(options.input);
    const layout = resolveLayout(table.header, options.long ? 'long' : 'wide');
    logger.debug({
      mode: layout.mode,
      regionIdx: layout.regionIdx,
      dateStart: layout.mode === 'long' ? layout.dateStart : undefined,
      cities: matcher.getTargets()
    }, 'Resolved column layout');
    let kept = 0;
    let total = 0;
    const sink = this.tableWriter.open(options.output);
    try {
      sink.write(outputHeader(layout));
      for (const row of table.rows) {
        total++;
        if (!matcher.matchesRow(row, layout.regionIdx)) continue;
        kept++;
        for (const out of reshapeRow(row, layout)) {
          sink.write(out);
        }
      }
    } catch (error) {
      this.closeAfterFailure(sink, options.output);
      throw error;
    }
    sink.close();
    logger.info({ kept, total, output: options.output }, 'Filter run complete');
    return {
      kept,
      total,
      outputPath: path.resolve(options.output)
    };
  }

  // The write error already in flight is the one the caller sees
  private closeAfterFailure(sink: IRowSink, output: string): void {
    try {
      sink.close();
    } catch (closeError) {
      logger.warn({ err: closeError, output }, 'Failed to close output after a write error');
    }
  }
}
