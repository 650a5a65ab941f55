import { describe, it, expect } from 'vitest';
import { analyzeGap } from '../engine/matching/gap-analyzer.js';
import { mockData } from './setup.js';

describe('analyzeGap', () => {
  const requirements = [
    mockData.requirement({ id: 'r1', categoryId: 'cat-a', quantityNeeded: 2 }),
    mockData.requirement({ id: 'r2', categoryId: 'cat-a', quantityNeeded: 1, projectId: 'proj-2' }),
    mockData.requirement({ id: 'r3', categoryId: 'cat-b', quantityNeeded: 1 }),
  ];

  const assets = [
    mockData.asset({ id: 'a1', categoryId: 'cat-a', status: 'available' }),
    mockData.asset({ id: 'a2', categoryId: 'cat-a', status: 'in_use' }),
    mockData.asset({ id: 'a3', categoryId: 'cat-a', status: 'maintenance' }),
    mockData.asset({ id: 'b1', categoryId: 'cat-b' }),
    mockData.asset({ id: 'b2', categoryId: 'cat-b' }),
    mockData.asset({ id: 'c1', categoryId: 'cat-c' }),
    mockData.asset({ id: 'd1', categoryId: 'cat-d', status: 'retired' }),
    mockData.asset({ id: 'x1', categoryId: null }),
  ];

  it('classifies every category once, in id order', () => {
    const result = analyzeGap(requirements, assets);

    expect(result.categories).toEqual([
      { categoryId: 'cat-a', status: 'unmet', needed: 3, available: 2, shortage: 1, surplus: 0 },
      { categoryId: 'cat-b', status: 'met', needed: 1, available: 2, shortage: 0, surplus: 1 },
      { categoryId: 'cat-c', status: 'over_provisioned', needed: 0, available: 1, shortage: 0, surplus: 1 },
    ]);
    expect(result.unmet.map((g) => g.categoryId)).toEqual(['cat-a']);
    expect(result.met.map((g) => g.categoryId)).toEqual(['cat-b']);
    expect(result.overProvisioned.map((g) => g.categoryId)).toEqual(['cat-c']);
  });

  it('scores matched demand against total demand', () => {
    const result = analyzeGap(requirements, assets);

    expect(result.totalRequired).toBe(4);
    expect(result.totalAvailable).toBe(5);
    expect(result.totalMatched).toBe(3);
    expect(result.gapScore).toBe(0.75);
  });

  it('never reports shortage and surplus together', () => {
    for (const gap of analyzeGap(requirements, assets).categories) {
      expect(gap.shortage === 0 || gap.surplus === 0).toBe(true);
    }
  });

  it('treats no demand as fully met', () => {
    const result = analyzeGap([], []);

    expect(result.categories).toEqual([]);
    expect(result.gapScore).toBe(1);
  });

  it('reports demand with no capacity at all as unmet', () => {
    const result = analyzeGap([mockData.requirement({ categoryId: 'cat-z', quantityNeeded: 2 })], []);

    expect(result.categories).toEqual([
      { categoryId: 'cat-z', status: 'unmet', needed: 2, available: 0, shortage: 2, surplus: 0 },
    ]);
    expect(result.gapScore).toBe(0);
  });
});
