import { describe, it, expect } from 'vitest';
import { rankAssetDemand } from '../engine/matching/demand-ranker.js';
import { mockData } from './setup.js';

const assets = ['a1', 'a2', 'a3'].map((id) => mockData.asset({ id, name: id }));

// team-x/proj-p uses a1 and a2; team-y uses a1 alone; a3 is never allocated
const allocations = [
  mockData.allocation({ id: 'x1', assetId: 'a1', teamId: 'team-x', projectId: 'proj-p', actualHoursUsed: 10 }),
  mockData.allocation({ id: 'x2', assetId: 'a2', teamId: 'team-x', projectId: 'proj-p', actualHoursUsed: 5 }),
  mockData.allocation({ id: 'y1', assetId: 'a1', teamId: 'team-y', actualHoursUsed: 0 }),
];

describe('rankAssetDemand', () => {
  it('returns nothing for an empty inventory', () => {
    expect(rankAssetDemand([], allocations)).toEqual({
      scores: [],
      iterations: 0,
      converged: true,
      nodeCount: 0,
      edgeCount: 0,
    });
  });

  it('keeps the teleport baseline when there is no usage', () => {
    const result = rankAssetDemand(assets, []);

    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(2);
    expect(result.edgeCount).toBe(0);
    expect(result.scores.map((s) => s.assetId)).toEqual(['a1', 'a2', 'a3']);
    for (const score of result.scores) {
      expect(score.rawScore).toBeCloseTo(0.05, 12);
      expect(score.demandScore).toBe(score.rawScore);
    }
  });

  it('builds a bipartite graph with one node per consumer', () => {
    const result = rankAssetDemand(assets, allocations);

    // 3 assets + team-x/proj-p + team-y
    expect(result.nodeCount).toBe(5);
    expect(result.edgeCount).toBe(6);
    expect(result.converged).toBe(true);
  });

  it('ranks shared assets above unused ones and normalises to [0, 1]', () => {
    const result = rankAssetDemand(assets, allocations);

    expect(result.scores.map((s) => s.assetId)).toEqual(['a1', 'a2', 'a3']);
    expect(result.scores[0].demandScore).toBe(1);
    expect(result.scores[2].demandScore).toBe(0);
    expect(result.scores[1].demandScore).toBeGreaterThan(0);
    expect(result.scores[1].demandScore).toBeLessThan(1);
  });

  it('never lets a raw score fall below (1 - d) / N', () => {
    const result = rankAssetDemand(assets, allocations);
    const floor = 0.15 / result.nodeCount;

    for (const score of result.scores) {
      expect(score.rawScore).toBeGreaterThanOrEqual(floor - 1e-12);
    }
    expect(result.scores[2].rawScore).toBeCloseTo(floor, 12);
  });

  it('barely moves once converged', () => {
    const loose = rankAssetDemand(assets, allocations, { convergenceThreshold: 1e-10, maxIterations: 1000 });
    const tight = rankAssetDemand(assets, allocations, { convergenceThreshold: 1e-13, maxIterations: 1000 });

    expect(tight.iterations).toBeGreaterThanOrEqual(loose.iterations);
    loose.scores.forEach((score, i) => {
      expect(tight.scores[i].assetId).toBe(score.assetId);
      expect(Math.abs(tight.scores[i].rawScore - score.rawScore)).toBeLessThan(1e-8);
    });
  });

  it('reports non-convergence when the iteration cap is hit', () => {
    const result = rankAssetDemand(assets, allocations, { maxIterations: 1 });

    expect(result.iterations).toBe(1);
    expect(result.converged).toBe(false);
  });

  it('ignores allocations of unknown assets', () => {
    const result = rankAssetDemand(assets, [mockData.allocation({ assetId: 'ghost' })]);

    expect(result.nodeCount).toBe(3);
    expect(result.edgeCount).toBe(0);
  });
});
