import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { SchemaMismatchError } from '@/lib/errors';
import { loadBoundaries, writeBoundaries, type BoundaryCollection } from '@/lib/geo/boundaries';
import { createTmpDir } from '../helpers/tmp-dir';

const { mockOpen } = vi.hoisted(() => ({
  mockOpen: vi.fn(),
}));

vi.mock('shapefile', () => ({
  open: mockOpen,
}));

const polygon = {
  type: 'Polygon',
  coordinates: [
    [
      [-76.99, 38.86],
      [-76.98, 38.86],
      [-76.98, 38.87],
      [-76.99, 38.86],
    ],
  ],
};

describe('boundaries.ts', () => {
  let tmp: Awaited<ReturnType<typeof createTmpDir>>;

  beforeEach(async () => {
    tmp = await createTmpDir();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  describe('loadBoundaries (.shp)', () => {
    it('シェープファイルを UTF-8 の属性付きで読み込む', async () => {
      const read = vi
        .fn()
        .mockResolvedValueOnce({
          done: false,
          value: {
            type: 'Feature',
            geometry: polygon,
            properties: { GEOID: '11001007401', ALAND: 125000 },
          },
        })
        .mockResolvedValueOnce({ done: true, value: undefined });
      const cancel = vi.fn().mockResolvedValue(undefined);
      mockOpen.mockResolvedValue({ read, cancel });

      const collection = await loadBoundaries('data/raw/tl_2024_11_tract.shp');

      expect(mockOpen).toHaveBeenCalledWith('data/raw/tl_2024_11_tract.shp', undefined, {
        encoding: 'utf-8',
      });
      expect(collection).toEqual({
        type: 'FeatureCollection',
        features: [
          {
            type: 'Feature',
            geometry: polygon,
            properties: { GEOID: '11001007401', ALAND: 125000 },
          },
        ],
      });
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('読み込み途中で失敗してもソースを閉じる', async () => {
      const read = vi
        .fn()
        .mockResolvedValueOnce({
          done: false,
          value: { type: 'Feature', geometry: polygon, properties: { GEOID: '11001007401' } },
        })
        .mockRejectedValueOnce(new Error('unexpected end of dbf'));
      const cancel = vi.fn().mockResolvedValue(undefined);
      mockOpen.mockResolvedValue({ read, cancel });

      await expect(loadBoundaries('data/raw/tl_2024_11_tract.shp')).rejects.toThrow(
        'unexpected end of dbf'
      );
      expect(read).toHaveBeenCalledTimes(2);
      expect(cancel).toHaveBeenCalledTimes(1);
    });
  });

  describe('loadBoundaries (GeoJSON)', () => {
    it('FeatureCollection を読み込み、null のプロパティは空オブジェクトにする', async () => {
      const filePath = tmp.path('tracts.geojson');
      await writeFile(
        filePath,
        JSON.stringify({
          type: 'FeatureCollection',
          features: [
            { type: 'Feature', id: 'a', geometry: polygon, properties: { GEOID: '001' } },
            { type: 'Feature', geometry: null, properties: null },
          ],
        }),
        'utf-8'
      );

      const collection = await loadBoundaries(filePath);

      expect(collection.features).toEqual([
        { type: 'Feature', id: 'a', geometry: polygon, properties: { GEOID: '001' } },
        { type: 'Feature', geometry: null, properties: {} },
      ]);
      expect(mockOpen).not.toHaveBeenCalled();
    });

    it('.json 拡張子も GeoJSON として読み込む', async () => {
      const filePath = tmp.path('tracts.json');
      await writeFile(filePath, JSON.stringify({ type: 'FeatureCollection', features: [] }), 'utf-8');

      const collection = await loadBoundaries(filePath);

      expect(collection).toEqual({ type: 'FeatureCollection', features: [] });
    });

    it('不正なジオメトリは SchemaMismatchError', async () => {
      const filePath = tmp.path('bad.geojson');
      await writeFile(
        filePath,
        JSON.stringify({
          type: 'FeatureCollection',
          features: [{ type: 'Feature', geometry: { type: 'Blob' }, properties: {} }],
        }),
        'utf-8'
      );

      await expect(loadBoundaries(filePath)).rejects.toThrow(SchemaMismatchError);
    });
  });

  it('未対応の拡張子は SchemaMismatchError', async () => {
    await expect(loadBoundaries('data/raw/tracts.kml')).rejects.toThrow(
      "Unsupported boundary format '.kml': data/raw/tracts.kml"
    );
  });

  describe('writeBoundaries', () => {
    it('親ディレクトリを作成して GeoJSON を書き出す', async () => {
      const filePath = tmp.path('processed', 'merged.geojson');
      const collection: BoundaryCollection = {
        type: 'FeatureCollection',
        features: [{ type: 'Feature', geometry: null, properties: { GEOID: '001', SCORE: null } }],
      };

      await writeBoundaries(filePath, collection);

      expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual(collection);
    });
  });
});
