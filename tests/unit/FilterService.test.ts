import path from 'path';
import { MissingColumnError } from '../../src/errors/AppErrors';
import { FilterOptions } from '../../src/models/FilterOptions';
import { Row, Table } from '../../src/models/Table';
import { IRowSink, ITableReader, ITableWriter } from '../../src/repositories/interfaces';
import { FilterService } from '../../src/services/FilterService';

// Mock repositories
const mockTableReader: jest.Mocked<ITableReader> = {
  read: jest.fn()
};
const mockSink: jest.Mocked<IRowSink> = {
  write: jest.fn(),
  close: jest.fn()
};
const mockTableWriter: jest.Mocked<ITableWriter> = {
  open: jest.fn()
};
const writtenRows = (): Row[] => mockSink.write.mock.calls.map(([row]) => row);
const table: Table = {
  header: ['RegionID', 'RegionName', 'CountyName', '2020-01-31', '2020-02-29'],
  rows: [
    ['1', 'Austin', 'Travis', '1500', '1520'],
    ['2', 'Dallas', 'Dallas', '1400', '1410'],
    ['3', ' san  MARCOS', 'Hays', '', '1100'],
    ['4'],
    ['5', 'Denton', 'Denton']
  ]
};
const options = (overrides: Partial<FilterOptions> = {}): FilterOptions => ({
  input: 'in.csv',
  output: 'out/cleaned.csv',
  long: false,
  cities: ['Austin', 'San Marcoc', 'Denton'],
  ...overrides
});
describe('FilterService', () => {
  let filterService: FilterService;
  beforeEach(() => {
    jest.clearAllMocks();
    mockTableReader.read.mockReturnValue(table);
    mockTableWriter.open.mockReturnValue(mockSink);
    filterService = new FilterService(mockTableReader, mockTableWriter);
  });
  describe('wide mode', () => {
    it('should write the header and matching rows verbatim', () => {
      const summary = filterService.run(options());
      expect(mockTableReader.read).toHaveBeenCalledWith('in.csv');
      expect(mockTableWriter.open).toHaveBeenCalledWith('out/cleaned.csv');
      expect(writtenRows()).toEqual([
        table.header,
        ['1', 'Austin', 'Travis', '1500', '1520'],
        ['3', ' san  MARCOS', 'Hays', '', '1100'],
        ['5', 'Denton', 'Denton']
      ]);
      expect(summary).toEqual({
        kept: 3,
        total: 5,
        outputPath: path.resolve('out/cleaned.csv')
      });
      expect(mockSink.close).toHaveBeenCalledTimes(1);
    });
  });
  describe('long mode', () => {
    it('should emit one row per non-empty date value', () => {
      const summary = filterService.run(options({ long: true }));
      expect(writtenRows()).toEqual([
        ['RegionID', 'RegionName', 'CountyName', 'Date', 'Value'],
        ['1', 'Austin', 'Travis', '2020-01-31', '1500'],
        ['1', 'Austin', 'Travis', '2020-02-29', '1520'],
        ['3', ' san  MARCOS', 'Hays', '2020-02-29', '1100']
      ]);
      // Denton is kept even though it contributes no value rows
      expect(summary.kept).toBe(3);
      expect(summary.total).toBe(5);
    });
  });
  it('should count every input row toward the total', () => {
    const summary = filterService.run(options({ cities: ['Nowhere'] }));
    expect(summary).toMatchObject({
      kept: 0,
      total: 5
    });
    expect(writtenRows()).toEqual([table.header]);
  });
  it('should fail before opening the output when RegionName is missing', () => {
    mockTableReader.read.mockReturnValue({
      header: ['City', '2020-01-31'],
      rows: [['Austin', '1500']]
    });
    expect(() => filterService.run(options())).toThrow(MissingColumnError);
    expect(mockTableWriter.open).not.toHaveBeenCalled();
  });
  it('should close the output when a write fails', () => {
    mockSink.write.mockImplementationOnce(() => undefined).mockImplementationOnce(() => {
      throw new Error('disk full');
    });
    expect(() => filterService.run(options())).toThrow('disk full');
    expect(mockSink.close).toHaveBeenCalledTimes(1);
  });
  it('should keep the write error when closing also fails', () => {
    mockSink.write.mockImplementationOnce(() => {
      throw new Error('disk full');
    });
    mockSink.close.mockImplementationOnce(() => {
      throw new Error('bad file descriptor');
    });
    expect(() => filterService.run(options())).toThrow('disk full');
    expect(mockSink.close).toHaveBeenCalledTimes(1);
  });
});
