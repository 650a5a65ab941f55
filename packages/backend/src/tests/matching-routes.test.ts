import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildSeededStore, buildTestApp, parseJsonResponse } from './setup.js';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock('../lib/redis.js', async (importOriginal) => {
  const orig = await importOriginal<typeof import('../lib/redis.js')>();
  return {
    ...orig,
    getCachedData: vi.fn(),
    setCachedData: vi.fn(),
    getCacheGeneration: vi.fn(),
    invalidateCache: vi.fn(),
  };
});

vi.mock('../jobs/queue.js', () => ({
  enqueueAnalyticsRefresh: vi.fn(),
}));

import { getCachedData, getCacheGeneration, setCachedData } from '../lib/redis.js';
import storePlugin from '../plugins/store.plugin.js';
import { matchingRoutes } from '../routes/matching.js';

const mockGetCachedData = vi.mocked(getCachedData);
const mockSetCachedData = vi.mocked(setCachedData);
const mockGetCacheGeneration = vi.mocked(getCacheGeneration);

interface ErrorBody {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

describe('Matching Routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    vi.clearAllMocks();
    mockGetCachedData.mockResolvedValue(null);
    mockSetCachedData.mockResolvedValue(true);
    mockGetCacheGeneration.mockResolvedValue(0);

    app = await buildTestApp();
    await app.register(storePlugin, { store: buildSeededStore() });
    await app.register(matchingRoutes);
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /api/match/urgent', () => {
    it('returns the best available asset with its details', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/urgent',
        payload: { categoryId: 'cat-gpu', quantity: 1, maxDailyCost: 9999 },
      });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{
        matches: Array<{ assetId: string; asset: { name: string; categoryName: string; specifications: unknown } }>;
        totalFound: number;
        upgradeSuggestion: unknown;
      }>(res);
      expect(body.totalFound).toBe(2);
      expect(body.matches.map((m) => m.assetId)).toEqual(['gpu-2']);
      expect(body.matches[0].asset).toMatchObject({
        name: 'GPU 2',
        categoryName: 'GPU Servers',
        specifications: { vram_gb: 24 },
      });
      expect(body.upgradeSuggestion).toBeNull();
      expect(mockGetCachedData).not.toHaveBeenCalled();
    });

    it('ranks by spec fit when constraints are given', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/urgent',
        payload: { categoryId: 'cat-gpu', quantity: 2, minSpecs: { vram_gb: 40 } },
      });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{ matches: Array<{ assetId: string; reasons: string[] }> }>(res);
      expect(body.matches.map((m) => m.assetId)).toEqual(['gpu-3', 'gpu-2']);
      expect(body.matches[0].reasons).toEqual(['best spec match', 'meets all spec constraints', 'lowest cost']);
    });

    it('returns 404 for an unknown category', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/urgent',
        payload: { categoryId: 'cat-none' },
      });

      expect(res.statusCode).toBe(404);
      expect(parseJsonResponse<ErrorBody>(res).message).toBe("AssetCategory with id 'cat-none' not found");
    });

    it('returns 400 for a non-positive quantity', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/urgent',
        payload: { categoryId: 'cat-gpu', quantity: 0 },
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).error).toBe('Validation Error');
    });
  });

  describe('GET /api/match/optimize/:projectId', () => {
    it('selects the best subset within the project budget and caches it', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/optimize/proj-1' });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{
        projectName: string;
        selectedAssetIds: string[];
        coverageScore: number;
        totalCostPerDay: number;
        cacheHit: boolean;
      }>(res);
      expect(body).toMatchObject({
        projectName: 'Project One',
        selectedAssetIds: ['gpu-3', 'lic-1'],
        coverageScore: 1,
        totalCostPerDay: 186,
        cacheHit: false,
      });
      expect(mockSetCachedData).toHaveBeenCalledWith('match:optimize:proj-1:project', expect.anything(), {
        generation: 0,
      });
    });

    it('honours a budget override', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/optimize/proj-1?budget=100' });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{ selectedAssetIds: string[]; coverageScore: number; budget: number }>(res);
      expect(body.budget).toBe(100);
      expect(body.selectedAssetIds).toEqual(['gpu-3']);
      expect(body.coverageScore).toBe(0.75);
    });

    it('returns 404 for an unknown project', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/optimize/ghost' });

      expect(res.statusCode).toBe(404);
    });
  });

  describe('GET /api/match/gap-analysis', () => {
    it('compares demand of live projects with capacity', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/gap-analysis' });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{
        categories: Array<{ categoryId: string; status: string; surplus: number; categoryName: string }>;
        gapScore: number;
        totalRequired: number;
      }>(res);
      expect(body.gapScore).toBe(1);
      expect(body.totalRequired).toBe(2);
      expect(body.categories.map((g) => [g.categoryId, g.status, g.surplus, g.categoryName])).toEqual([
        ['cat-gpu', 'met', 2, 'GPU Servers'],
        ['cat-lic', 'met', 0, 'Licenses'],
      ]);
    });

    it('serves a cached result without recomputing', async () => {
      mockGetCachedData.mockResolvedValueOnce({ gapScore: 0.5, categories: [] });

      const res = await app.inject({ method: 'GET', url: '/api/match/gap-analysis' });

      expect(res.statusCode).toBe(200);
      expect(parseJsonResponse(res)).toEqual({ gapScore: 0.5, categories: [], cacheHit: true });
      expect(mockSetCachedData).not.toHaveBeenCalled();
    });

    it('bypasses the cache when asked', async () => {
      await app.inject({ method: 'GET', url: '/api/match/gap-analysis?skipCache=true' });

      expect(mockGetCachedData).not.toHaveBeenCalled();
      expect(mockSetCachedData).toHaveBeenCalledWith('match:gap', expect.anything(), { generation: 0 });
    });
  });

  describe('GET /api/match/demand-scores', () => {
    it('ranks every asset', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/demand-scores' });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{
        scores: Array<{ assetId: string; name: string }>;
        nodeCount: number;
        edgeCount: number;
        converged: boolean;
        lookbackDays: number | null;
      }>(res);
      expect(body.scores).toHaveLength(4);
      expect(body.nodeCount).toBe(6);
      expect(body.edgeCount).toBe(4);
      expect(body.converged).toBe(true);
      expect(body.lookbackDays).toBeNull();
    });

    it('keys the cache by lookback window', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/demand-scores?lookbackDays=30' });

      expect(res.statusCode).toBe(200);
      expect(parseJsonResponse<{ lookbackDays: number }>(res).lookbackDays).toBe(30);
      expect(mockGetCachedData).toHaveBeenCalledWith('match:demand:30');
    });

    it('rejects a zero lookback', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/demand-scores?lookbackDays=0' });

      expect(res.statusCode).toBe(400);
    });
  });

  describe('GET /api/match/collaboration-graph', () => {
    it('puts assets never used together in their own communities', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/match/collaboration-graph' });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{ edges: unknown[]; communities: Array<{ size: number }>; nodes: unknown[] }>(res);
      expect(body.edges).toEqual([]);
      expect(body.nodes).toHaveLength(4);
      expect(body.communities.map((c) => c.size)).toEqual([1, 1, 1, 1]);
    });
  });

  describe('POST /api/match/upgrade-path', () => {
    it('finds the nearest asset meeting a capability', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/upgrade-path',
        payload: { sourceAssetId: 'gpu-2', minSpecs: { vram_gb: 80 } },
      });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<{ path: string[]; found: boolean; assets: Array<{ name: string }> }>(res);
      expect(body.path).toEqual(['gpu-2', 'gpu-1']);
      expect(body.found).toBe(true);
      expect(body.assets.map((a) => a.name)).toEqual(['GPU 2', 'GPU 1']);
    });

    it('reports an unreachable target as not found', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/upgrade-path',
        payload: { sourceAssetId: 'gpu-1', targetAssetId: 'gpu-2' },
      });

      expect(res.statusCode).toBe(200);
      expect(parseJsonResponse(res)).toEqual({ sourceAssetId: 'gpu-1', path: [], found: false, assets: [] });
    });

    it('requires exactly one kind of target', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/upgrade-path',
        payload: { sourceAssetId: 'gpu-2', targetAssetId: 'gpu-1', minSpecs: { vram_gb: 80 } },
      });

      expect(res.statusCode).toBe(400);
    });

    it('returns 404 for an unknown source', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/match/upgrade-path',
        payload: { sourceAssetId: 'nope', targetAssetId: 'gpu-1' },
      });

      expect(res.statusCode).toBe(404);
      expect(parseJsonResponse<ErrorBody>(res).message).toBe("Asset with id 'nope' not found");
    });
  });
});
