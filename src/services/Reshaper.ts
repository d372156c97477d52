import { config } from '../config/env';
import { ColumnLayout, Header, Row } from '../models/Table';
export function outputHeader(layout: ColumnLayout): Header {
  if (layout.mode === 'wide') {
    return [...layout.header];
  }
  return [...layout.header.slice(0, layout.dateStart), config.columns.date, config.columns.value];
}

/**
 * Rows to emit for one kept input row.
 *
 * Wide mode returns the row unchanged. Long mode returns one row per
 * non-empty date cell, in header order; blank or missing cells emit nothing.
 */
export function reshapeRow(row: Row, layout: ColumnLayout): Row[] {
  if (layout.mode === 'wide') {
    return [row];
  }
  const { header, dateStart } = layout;
  const meta = row.slice(0, dateStart);
  const out: Row[] = [];
  for (let i = dateStart; i < header.length; i++) {
    const value = i < row.length ? row[i] : '';
    if (value === '') continue;
    out.push([...meta, header[i], value]);
  }
  return out;
}
