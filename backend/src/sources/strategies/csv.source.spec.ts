import { CsvTableSource, csvTitle, parseCsvBuffer } from './csv.source';
import { ReferenceReader } from '../reference-reader';
import { SourceUnavailableError } from '../interfaces/table-source.interface';
import { createCsvBuffer } from '../../../test/utils/sheet-builder';

describe('CsvTableSource', () => {
  let reader: ReferenceReader;
  let source: CsvTableSource;

  beforeEach(() => {
    reader = new ReferenceReader();
    source = new CsvTableSource(reader);
  });

  describe('canHandle', () => {
    it('should accept csv files and csv exports', () => {
      expect(source.canHandle('./data/vt.csv')).toBe(true);
      expect(source.canHandle('https://example.com/VT.CSV?token=x')).toBe(true);
      expect(
        source.canHandle('https://docs.google.com/spreadsheets/d/abc/export?format=csv'),
      ).toBe(true);
    });

    it('should reject workbooks', () => {
      expect(source.canHandle('./data/vt.xlsx')).toBe(false);
      expect(source.canHandle('https://docs.google.com/spreadsheets/d/abc/edit')).toBe(false);
    });
  });

  describe('csvTitle', () => {
    it('should use the file name without extension', () => {
      expect(csvTitle('./data/vt-vacuum.csv')).toBe('vt-vacuum');
      expect(csvTitle('https://example.com/exports/ny.csv?x=1')).toBe('ny');
    });
  });

  describe('parseCsvBuffer', () => {
    it('should trim headers and drop a byte order mark', async () => {
      const buffer = createCsvBuffer([
        '\uFEFFName, Vacuum ,Last Communication',
        'RHAS13,21.5,2025-03-01 08:00',
        'MPC2,,2025-03-01 09:00',
      ]);

      const sheet = await parseCsvBuffer(buffer, 'vt');

      expect(sheet.header).toEqual(['Name', 'Vacuum', 'Last Communication']);
      expect(sheet.rows).toEqual([
        { Name: 'RHAS13', Vacuum: '21.5', 'Last Communication': '2025-03-01 08:00' },
        { Name: 'MPC2', Vacuum: '', 'Last Communication': '2025-03-01 09:00' },
      ]);
    });
  });

  describe('load', () => {
    it('should return a single sheet named after the file', async () => {
      jest
        .spyOn(reader, 'read')
        .mockResolvedValue(createCsvBuffer(['Name,Vacuum', 'RHAS13,20']));

      const sheets = await source.load('./data/vt.csv');

      expect(sheets).toHaveLength(1);
      expect(sheets[0].title).toBe('vt');
      expect(sheets[0].rows).toEqual([{ Name: 'RHAS13', Vacuum: '20' }]);
      expect(reader.read).toHaveBeenCalledWith('./data/vt.csv', 'csv');
    });

    it('should propagate unavailable sources', async () => {
      jest
        .spyOn(reader, 'read')
        .mockRejectedValue(new SourceUnavailableError('csv', './x.csv', 'Cannot read file'));

      await expect(source.load('./x.csv')).rejects.toThrow('[csv] Cannot read file');
    });
  });
});
