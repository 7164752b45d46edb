import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import {
  parseCsv,
  parseCsvLines,
  parseCellValue,
  stringifyCsv,
  readCsvFile,
  writeCsvFile,
} from '@/lib/utils/csv';
import { createTmpDir } from '../helpers/tmp-dir';

describe('csv.ts', () => {
  describe('parseCsvLines', () => {
    it('ダブルクォート内のカンマとエスケープを扱う', () => {
      const lines = parseCsvLines('a,b,c\n"Washington, DC","say ""hi""",3\n');
      expect(lines).toEqual([
        ['a', 'b', 'c'],
        ['Washington, DC', 'say "hi"', '3'],
      ]);
    });

    it('CRLF と空行を扱う', () => {
      expect(parseCsvLines('ID,NAME\r\n\r\n1,A\r\n')).toEqual([
        ['ID', 'NAME'],
        ['1', 'A'],
      ]);
    });
  });

  describe('parseCsv', () => {
    it('ヘッダーをキーにした行オブジェクトを返す', () => {
      const csv = parseCsv('ID,ST_ABBREV,PM25\n11001007401,DC,8.1\n');
      expect(csv.header).toEqual(['ID', 'ST_ABBREV', 'PM25']);
      expect(csv.rows).toEqual([{ ID: '11001007401', ST_ABBREV: 'DC', PM25: '8.1' }]);
    });

    it('BOM を除去し、足りないセルは空文字で埋める', () => {
      const csv = parseCsv('\uFEFFID,NAME,VALUE\n1,A\n');
      expect(csv.header).toEqual(['ID', 'NAME', 'VALUE']);
      expect(csv.rows).toEqual([{ ID: '1', NAME: 'A', VALUE: '' }]);
    });

    it('空テキストは空の結果を返す', () => {
      expect(parseCsv('')).toEqual({ header: [], rows: [] });
    });

    it('__proto__ ヘッダーも通常のカラムとして扱う', () => {
      const csv = parseCsv('__proto__,ID\npolluted,1\n');
      const [row] = csv.rows;

      expect(csv.header).toEqual(['__proto__', 'ID']);
      expect(Object.hasOwn(row, '__proto__')).toBe(true);
      expect(row['__proto__']).toBe('polluted');
      expect(row.ID).toBe('1');
      expect(Object.getPrototypeOf(row)).toBe(Object.prototype);
    });
  });

  describe('parseCellValue', () => {
    it('空文字は null', () => {
      expect(parseCellValue('')).toBeNull();
      expect(parseCellValue(undefined)).toBeNull();
    });

    it('数値文字列は number に変換する', () => {
      expect(parseCellValue('42')).toBe(42);
      expect(parseCellValue('-0.5')).toBe(-0.5);
      expect(parseCellValue('1.5e3')).toBe(1500);
    });

    it('それ以外は文字列のまま', () => {
      expect(parseCellValue('DC')).toBe('DC');
      expect(parseCellValue('1,000')).toBe('1,000');
    });
  });

  describe('stringifyCsv', () => {
    it('ヘッダー順に出力し、必要なセルだけクォートする', () => {
      const text = stringifyCsv(
        ['area_id', 'name', 'value'],
        [
          { area_id: '110010074011', name: 'Washington, DC', value: 1.5 },
          { area_id: '110010074012', name: 'say "hi"', value: null },
        ]
      );
      expect(text).toBe(
        'area_id,name,value\n' +
          '110010074011,"Washington, DC",1.5\n' +
          '110010074012,"say ""hi""",\n'
      );
    });
  });

  describe('readCsvFile / writeCsvFile', () => {
    let tmp: Awaited<ReturnType<typeof createTmpDir>>;

    beforeEach(async () => {
      tmp = await createTmpDir();
    });

    afterEach(async () => {
      await tmp.cleanup();
    });

    it('親ディレクトリを作成して書き出し、読み戻せる', async () => {
      const filePath = tmp.path('nested', 'dir', 'out.csv');
      await writeCsvFile(filePath, ['ID', 'VALUE'], [{ ID: '001', VALUE: 3 }]);

      expect(await readFile(filePath, 'utf-8')).toBe('ID,VALUE\n001,3\n');

      const csv = await readCsvFile(filePath);
      expect(csv.rows).toEqual([{ ID: '001', VALUE: '3' }]);
    });

    it('UTF-8 で読み込む', async () => {
      const filePath = tmp.path('utf8.csv');
      await writeFile(filePath, 'NAME\nAnacostia – Southeast\n', 'utf-8');

      const csv = await readCsvFile(filePath);
      expect(csv.rows[0].NAME).toBe('Anacostia – Southeast');
    });
  });
});
