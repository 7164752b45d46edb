/**
 * 境界データと表データの属性結合
 *
 * @description 境界（左）に表データ（右）を正規化済みIDで左外部結合する。
 * - 境界フィーチャは必ず1件以上出力される（未一致は表側カラムが null）
 * - 表側キーが重複すると行が増えるため、既定では重複をエラーにする
 * - 一致件数（matchedCount）を主な成功指標として返す
 */

import { DuplicateJoinKeyError, SchemaMismatchError } from '../errors';
import { parseCellValue, type ParsedCsv, type CsvRow } from '../utils/csv';
import type { BoundaryCollection, BoundaryFeature, FeatureProperties } from './boundaries';
import { normalizeBoundaryId, normalizeTableId } from './identifier';

export type DuplicateKeyPolicy = 'error' | 'fanout';

export interface MergeOptions {
  /** 境界側のIDカラム（デフォルト: GEOID） */
  boundaryKey?: string;
  /** 表側のIDカラム（デフォルト: ID） */
  tableKey?: string;
  /** 表側キー重複時の扱い（デフォルト: error） */
  duplicateKeys?: DuplicateKeyPolicy;
}

export interface MatchDiagnostics {
  /** 表側キーが non-null の出力行数 */
  matchedCount: number;
  /** 出力行数 */
  totalCount: number;
  /** 一致しなかった境界ID（境界の順） */
  unmatchedBoundaryIds: string[];
  /** どの境界にも使われなかった表側キー（表の順） */
  unusedTableKeys: string[];
  /** 表側で重複していたキー */
  duplicateTableKeys: string[];
}

export interface MergeResult {
  collection: BoundaryCollection;
  diagnostics: MatchDiagnostics;
}

/** 重複カラムに付ける接尾辞（境界側, 表側） */
const SUFFIXES = ['_x', '_y'] as const;

/**
 * 境界側の全プロパティ名（初出順）
 */
function collectPropertyNames(features: readonly BoundaryFeature[]): string[] {
  const names = new Set<string>();
  for (const feature of features) {
    for (const name of Object.keys(feature.properties)) {
      names.add(name);
    }
  }
  return [...names];
}

/**
 * 表データを正規化キーで索引化（空キーの行は結合対象外）
 */
function indexRows(rows: readonly CsvRow[], tableKey: string): Map<string, CsvRow[]> {
  const index = new Map<string, CsvRow[]>();
  for (const row of rows) {
    const key = normalizeTableId(row[tableKey]);
    if (key === '') continue;

    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }
  return index;
}

/**
 * 境界フィーチャと表データを左外部結合
 *
 * @throws {SchemaMismatchError} キーカラムが存在しない場合
 * @throws {DuplicateJoinKeyError} duplicateKeys: 'error' で表側キーが重複している場合
 */
export function mergeFeatures(
  boundaries: BoundaryCollection,
  table: ParsedCsv,
  options: MergeOptions = {}
): MergeResult {
  const { boundaryKey = 'GEOID', tableKey = 'ID', duplicateKeys = 'error' } = options;

  if (!table.header.includes(tableKey)) {
    throw new SchemaMismatchError(tableKey, table.header);
  }

  const boundaryColumns = collectPropertyNames(boundaries.features);
  if (boundaries.features.length > 0 && !boundaryColumns.includes(boundaryKey)) {
    throw new SchemaMismatchError(boundaryKey, boundaryColumns);
  }

  const index = indexRows(table.rows, tableKey);
  const duplicates = [...index].filter(([, bucket]) => bucket.length > 1).map(([key]) => key);
  if (duplicates.length > 0 && duplicateKeys === 'error') {
    throw new DuplicateJoinKeyError(duplicates);
  }

  // 同名キーで結合する場合はキーカラムを1本にまとめる
  const sharedKey = boundaryKey === tableKey;
  const tableColumns = table.header.filter((column) => !(sharedKey && column === tableKey));
  const overlapping = new Set(tableColumns.filter((column) => boundaryColumns.includes(column)));
  const boundaryName = (column: string) =>
    overlapping.has(column) ? `${column}${SUFFIXES[0]}` : column;
  const tableName = (column: string) =>
    overlapping.has(column) ? `${column}${SUFFIXES[1]}` : column;

  const features: BoundaryFeature[] = [];
  const unmatchedBoundaryIds: string[] = [];
  const usedKeys = new Set<string>();
  let matchedCount = 0;

  for (const feature of boundaries.features) {
    const source = feature.properties;
    const boundaryId = normalizeBoundaryId(source[boundaryKey]);

    // 代入ではなく entries から作る（"__proto__" 列も通常のプロパティになる）
    const baseEntries = Object.entries(source).map(
      ([column, value]): [string, unknown] => [
        boundaryName(column),
        column === boundaryKey ? boundaryId : value,
      ]
    );

    const build = (row: CsvRow | null): BoundaryFeature => {
      const tableEntries = tableColumns.map((column): [string, unknown] => {
        if (row === null) return [tableName(column), null];
        if (column === tableKey) return [tableName(column), normalizeTableId(row[column])];
        return [tableName(column), parseCellValue(row[column])];
      });
      const properties: FeatureProperties = Object.fromEntries([...baseEntries, ...tableEntries]);
      return {
        type: 'Feature',
        ...(feature.id !== undefined ? { id: feature.id } : {}),
        geometry: feature.geometry,
        properties,
      };
    };

    const matches = index.get(boundaryId);
    if (!matches) {
      unmatchedBoundaryIds.push(boundaryId);
      features.push(build(null));
      continue;
    }

    usedKeys.add(boundaryId);
    for (const row of matches) {
      features.push(build(row));
      matchedCount++;
    }
  }

  return {
    collection: { type: 'FeatureCollection', features },
    diagnostics: {
      matchedCount,
      totalCount: features.length,
      unmatchedBoundaryIds,
      unusedTableKeys: [...index.keys()].filter((key) => !usedKeys.has(key)),
      duplicateTableKeys: duplicates,
    },
  };
}
