/**
 * CSV ユーティリティ
 *
 * @description ヘッダー付き CSV の読み書き（UTF-8、ダブルクォート対応）
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';

/** ヘッダー名をキーにした1行分のセル */
export type CsvRow = Record<string, string>;

export interface ParsedCsv {
  header: string[];
  rows: CsvRow[];
}

/** 出力時に受け付けるセル値 */
export type CsvCell = string | number | boolean | null | undefined;

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * CSVテキストを行ごとにパース（ダブルクォート対応）
 *
 * NOTE: クォート内の改行には対応しない（EJScreen / ACS の CSV には含まれない）
 */
export function parseCsvLines(csvText: string): string[][] {
  const lines = csvText.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.map((line) => {
    const cells: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const ch = line[i];
      if (inQuotes) {
        if (ch === '"' && line[i + 1] === '"') {
          current += '"';
          i++;
        } else if (ch === '"') {
          inQuotes = false;
        } else {
          current += ch;
        }
      } else if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        cells.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
    cells.push(current.trim());
    return cells;
  });
}

/**
 * ヘッダー行をキーにして行オブジェクトへ変換
 *
 * 列数が足りない行は空文字で埋める。
 */
export function parseCsv(csvText: string): ParsedCsv {
  // 先頭の BOM を除去
  const text = csvText.charCodeAt(0) === 0xfeff ? csvText.slice(1) : csvText;
  const lines = parseCsvLines(text);
  if (lines.length === 0) {
    return { header: [], rows: [] };
  }

  const [header, ...body] = lines;
  const rows = body.map(
    (cells): CsvRow =>
      Object.fromEntries(header.map((column, index) => [column, cells[index] ?? '']))
  );

  return { header, rows };
}

/**
 * セル文字列を値に変換（空 → null、数値文字列 → number）
 */
export function parseCellValue(cell: string | undefined): string | number | null {
  if (cell === undefined || cell === '') {
    return null;
  }
  if (NUMERIC_PATTERN.test(cell)) {
    const value = Number(cell);
    if (Number.isFinite(value)) {
      return value;
    }
  }
  return cell;
}

function escapeCell(value: CsvCell): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * 行オブジェクトを CSV テキストに変換（ヘッダー順に出力）
 */
export function stringifyCsv(
  header: readonly string[],
  rows: ReadonlyArray<Record<string, CsvCell>>
): string {
  const lines = [header.map(escapeCell).join(',')];
  for (const row of rows) {
    lines.push(header.map((column) => escapeCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * CSV ファイルを読み込む（UTF-8）
 */
export async function readCsvFile(filePath: string): Promise<ParsedCsv> {
  const text = await readFile(filePath, 'utf-8');
  return parseCsv(text);
}

/**
 * CSV ファイルを書き出す（親ディレクトリは必要に応じて作成）
 */
export async function writeCsvFile(
  filePath: string,
  header: readonly string[],
  rows: ReadonlyArray<Record<string, CsvCell>>
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, stringifyCsv(header, rows), 'utf-8');
}
