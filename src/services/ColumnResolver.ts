import { config } from '../config/env';
import { DateColumnsNotFoundError, MissingColumnError } from '../errors/AppErrors';
import { ColumnLayout, Header, OutputMode } from '../models/Table';

/**
 * True for names shaped like `YYYY-MM-DD`. Only the length and dash
 * positions are checked; other date spellings are not recognised.
 */
export function looksLikeIsoDate(column: string): boolean {
  return column.length === 10 && column[4] === '-' && column[7] === '-';
}
export function resolveRegionIndex(header: Header): number {
  const idx = header.indexOf(config.columns.region);
  if (idx === -1) {
    throw new MissingColumnError(config.columns.region);
  }
  return idx;
}

/**
 * First value column for long output.
 * Columns after CountyName when it exists, else the first date-shaped column.
 */
export function resolveDateStart(header: Header): number {
  const countyIdx = header.indexOf(config.columns.county);
  if (countyIdx !== -1) {
    return countyIdx + 1;
  }
  const dateIdx = header.findIndex(looksLikeIsoDate);
  if (dateIdx === -1) {
    throw new DateColumnsNotFoundError();
  }
  return dateIdx;
}
export function resolveLayout(header: Header, mode: OutputMode): ColumnLayout {
  const regionIdx = resolveRegionIndex(header);
  if (mode === 'wide') {
    return {
      mode,
      header,
      regionIdx
    };
  }
  return {
    mode,
    header,
    regionIdx,
    dateStart: resolveDateStart(header)
  };
}
