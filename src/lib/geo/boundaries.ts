/**
 * 境界データの読み書き
 *
 * @description TIGER/Line シェープファイル（.shp + .dbf）または GeoJSON を
 * FeatureCollection として読み込み、結合結果を GeoJSON で書き出す。
 */

import type { Feature, FeatureCollection, Geometry } from 'geojson';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import { open as openShapefile } from 'shapefile';
import { z } from 'zod';
import { SchemaMismatchError } from '../errors';
import { writeJsonFile } from '../utils/files';
import { createLogger } from '../utils/logger';

const logger = createLogger({ module: 'boundaries' });

export type FeatureProperties = Record<string, unknown>;
export type BoundaryFeature = Feature<Geometry | null, FeatureProperties>;
export type BoundaryCollection = FeatureCollection<Geometry | null, FeatureProperties>;

const GEOMETRY_TYPES = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
]);

function isGeometry(value: unknown): value is Geometry {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  if (typeof value.type !== 'string' || !GEOMETRY_TYPES.has(value.type)) {
    return false;
  }
  return value.type === 'GeometryCollection' ? 'geometries' in value : 'coordinates' in value;
}

const GeoJsonSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      type: z.literal('Feature'),
      id: z.union([z.string(), z.number()]).optional(),
      geometry: z.custom<Geometry>(isGeometry).nullable(),
      properties: z.record(z.string(), z.unknown()).nullable(),
    })
  ),
});

/**
 * シェープファイルを読み込む（同名の .dbf を属性テーブルとして使う）
 */
async function readShapefile(filePath: string): Promise<BoundaryCollection> {
  const source = await openShapefile(filePath, undefined, { encoding: 'utf-8' });
  const features: BoundaryFeature[] = [];

  try {
    let result = await source.read();
    while (!result.done) {
      const feature = result.value;
      features.push({
        type: 'Feature',
        geometry: feature.geometry,
        properties: { ...feature.properties },
      });
      result = await source.read();
    }
  } finally {
    await source.cancel();
  }

  return { type: 'FeatureCollection', features };
}

/**
 * GeoJSON FeatureCollection を読み込む
 */
async function readGeoJson(filePath: string): Promise<BoundaryCollection> {
  const text = await readFile(filePath, 'utf-8');
  const parsed = GeoJsonSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchemaMismatchError(
      issue?.path.join('.') ?? 'features',
      [],
      `Invalid GeoJSON FeatureCollection in ${filePath}: ${issue?.message ?? 'unknown error'}`
    );
  }

  return {
    type: 'FeatureCollection',
    features: parsed.data.features.map((feature): BoundaryFeature => ({
      type: 'Feature',
      ...(feature.id !== undefined ? { id: feature.id } : {}),
      geometry: feature.geometry,
      properties: { ...feature.properties },
    })),
  };
}

/**
 * 拡張子に応じて境界データを読み込む（.shp / .geojson / .json）
 *
 * @throws {SchemaMismatchError} 未対応の形式・不正な GeoJSON
 */
export async function loadBoundaries(filePath: string): Promise<BoundaryCollection> {
  const extension = extname(filePath).toLowerCase();
  logger.info('Loading boundaries', { path: filePath, format: extension });

  let collection: BoundaryCollection;
  switch (extension) {
    case '.shp':
      collection = await readShapefile(filePath);
      break;
    case '.geojson':
    case '.json':
      collection = await readGeoJson(filePath);
      break;
    default:
      throw new SchemaMismatchError(
        'format',
        ['.shp', '.geojson', '.json'],
        `Unsupported boundary format '${extension}': ${filePath}`
      );
  }

  logger.info('Boundaries loaded', { path: filePath, featureCount: collection.features.length });
  return collection;
}

/**
 * FeatureCollection を GeoJSON として書き出す
 */
export async function writeBoundaries(
  filePath: string,
  collection: BoundaryCollection
): Promise<void> {
  await writeJsonFile(filePath, collection);
  logger.info('Boundaries saved', { path: filePath, featureCount: collection.features.length });
}
