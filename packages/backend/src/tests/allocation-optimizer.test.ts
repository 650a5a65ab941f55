import { describe, it, expect } from 'vitest';
import { budgetStepFor, optimizeAllocation } from '../engine/matching/allocation-optimizer.js';
import { mockData, specs } from './setup.js';

const project = mockData.project({ id: 'proj-1', budget: 400 });

describe('budgetStepFor', () => {
  it('keeps the table within 2000 steps', () => {
    expect(budgetStepFor(0)).toBe(1);
    expect(budgetStepFor(400)).toBe(1);
    expect(budgetStepFor(2000)).toBe(1);
    expect(budgetStepFor(2001)).toBe(10);
    expect(budgetStepFor(50000)).toBe(100);
  });
});

describe('optimizeAllocation', () => {
  const requirements = [
    mockData.requirement({ id: 'r-gpu', categoryId: 'cat-gpu', priority: 'required' }),
    mockData.requirement({ id: 'r-lic', categoryId: 'cat-lic', priority: 'optional' }),
  ];
  const assets = [
    mockData.asset({ id: 'gpu-1', categoryId: 'cat-gpu', costPerDay: 300 }),
    mockData.asset({ id: 'lic-1', categoryId: 'cat-lic', costPerDay: 150 }),
  ];

  it('prefers the higher-priority item when both do not fit', () => {
    const result = optimizeAllocation({ project, requirements, assets, allocations: [] });

    expect(result.selectedAssetIds).toEqual(['gpu-1']);
    expect(result.achievedValue).toBe(3);
    expect(result.maxValue).toBe(4);
    expect(result.coverageScore).toBe(0.75);
    expect(result.totalCostPerDay).toBe(300);
    expect(result.budget).toBe(400);
    expect(result.budgetStep).toBe(1);
    expect(result.requirements.map((r) => [r.requirementId, r.selectedAssetIds])).toEqual([
      ['r-gpu', ['gpu-1']],
      ['r-lic', []],
    ]);
  });

  it('selects nothing with a zero budget', () => {
    const result = optimizeAllocation({ project, requirements, assets, allocations: [], budget: 0 });

    expect(result.selectedAssetIds).toEqual([]);
    expect(result.coverageScore).toBe(0);
    expect(result.totalCostPerDay).toBe(0);
  });

  it('reaches the best achievable coverage when the budget covers everything', () => {
    const result = optimizeAllocation({
      project,
      requirements: [
        mockData.requirement({
          id: 'r-gpu',
          quantityNeeded: 2,
          minSpec: specs({ vram_gb: 40, gpu_count: 4 }),
        }),
        mockData.requirement({ id: 'r-lic', categoryId: 'cat-lic', priority: 'optional' }),
      ],
      assets: [
        mockData.asset({ id: 'gpu-1', costPerDay: 300, specifications: specs({ vram_gb: 80, gpu_count: 8 }) }),
        mockData.asset({ id: 'gpu-2', costPerDay: 36, specifications: specs({ vram_gb: 24, gpu_count: 4 }) }),
        mockData.asset({ id: 'lic-1', categoryId: 'cat-lic', costPerDay: 150 }),
      ],
      allocations: [],
      budget: 1000,
    });

    expect(result.selectedAssetIds).toEqual(['gpu-1', 'gpu-2', 'lic-1']);
    expect(result.achievedValue).toBe(5.5);
    expect(result.maxValue).toBe(7);
    expect(result.coverageScore).toBeCloseTo(5.5 / 7, 12);
    expect(result.totalCostPerDay).toBe(486);
    expect(result.requirements[0].upgradePath).toEqual([]);
  });

  it('never counts more assets than a requirement asks for', () => {
    const result = optimizeAllocation({
      project,
      requirements: [mockData.requirement({ id: 'r-gpu', quantityNeeded: 1 })],
      assets: [
        mockData.asset({ id: 'gpu-a', costPerDay: 50 }),
        mockData.asset({ id: 'gpu-b', costPerDay: 40 }),
      ],
      allocations: [],
      budget: 1000,
    });

    expect(result.selectedAssetIds).toEqual(['gpu-b']);
    expect(result.coverageScore).toBe(1);
  });

  it('fills two requirements of the same category with different assets', () => {
    const result = optimizeAllocation({
      project,
      requirements: [
        mockData.requirement({ id: 'r-main', priority: 'required' }),
        mockData.requirement({ id: 'r-spare', priority: 'optional' }),
      ],
      assets: [
        mockData.asset({ id: 'gpu-a', costPerDay: 10 }),
        mockData.asset({ id: 'gpu-b', costPerDay: 20 }),
      ],
      allocations: [],
      budget: 1000,
    });

    expect(result.selectedAssetIds).toEqual(['gpu-a', 'gpu-b']);
    expect(result.achievedValue).toBe(4);
    expect(result.maxValue).toBe(4);
    expect(result.coverageScore).toBe(1);
    expect(result.totalCostPerDay).toBe(30);
    expect(result.requirements.map((r) => r.selectedAssetIds.length)).toEqual([1, 1]);
  });

  it('counts a shared-category asset against one requirement only', () => {
    const result = optimizeAllocation({
      project,
      requirements: [
        mockData.requirement({ id: 'r-main', priority: 'required' }),
        mockData.requirement({ id: 'r-spare', priority: 'optional' }),
      ],
      assets: [mockData.asset({ id: 'gpu-a', costPerDay: 10 })],
      allocations: [],
      budget: 1000,
    });

    expect(result.selectedAssetIds).toEqual(['gpu-a']);
    expect(result.achievedValue).toBe(3);
    expect(result.coverageScore).toBe(0.75);
    expect(result.requirements.map((r) => [r.requirementId, r.selectedAssetIds])).toEqual([
      ['r-main', ['gpu-a']],
      ['r-spare', []],
    ]);
  });

  it('rounds item costs up so the selection stays within budget', () => {
    const result = optimizeAllocation({
      project,
      requirements: [mockData.requirement({ id: 'r-gpu', quantityNeeded: 2 })],
      assets: [
        mockData.asset({ id: 'gpu-a', costPerDay: 1255 }),
        mockData.asset({ id: 'gpu-b', costPerDay: 1255 }),
      ],
      allocations: [],
      budget: 2500,
    });

    expect(result.budgetStep).toBe(10);
    expect(result.selectedAssetIds).toEqual(['gpu-a']);
    expect(result.coverageScore).toBe(0.5);
  });

  it('only reuses in-use assets already allocated to the project', () => {
    const result = optimizeAllocation({
      project,
      requirements: [mockData.requirement({ id: 'r-gpu', quantityNeeded: 2 })],
      assets: [
        mockData.asset({ id: 'gpu-x', costPerDay: 100, status: 'in_use' }),
        mockData.asset({ id: 'gpu-y', costPerDay: 100, status: 'in_use' }),
        mockData.asset({ id: 'gpu-z', costPerDay: 100, status: 'maintenance' }),
      ],
      allocations: [
        mockData.allocation({ id: 'al-x', assetId: 'gpu-x', projectId: 'proj-1' }),
        mockData.allocation({ id: 'al-y', assetId: 'gpu-y', projectId: 'proj-2' }),
      ],
    });

    expect(result.selectedAssetIds).toEqual(['gpu-x']);
  });

  it('suggests an upgrade path when no eligible asset meets the min-spec', () => {
    const result = optimizeAllocation({
      project,
      requirements: [mockData.requirement({ id: 'r-gpu', minSpec: specs({ vram_gb: 80 }) })],
      assets: [
        mockData.asset({ id: 'gpu-small', costPerDay: 36, specifications: specs({ vram_gb: 24 }) }),
        mockData.asset({
          id: 'gpu-big',
          costPerDay: 300,
          status: 'maintenance',
          specifications: specs({ vram_gb: 80 }),
        }),
      ],
      allocations: [],
    });

    expect(result.selectedAssetIds).toEqual([]);
    expect(result.coverageScore).toBe(0);
    expect(result.requirements[0].upgradePath).toEqual(['gpu-small', 'gpu-big']);
  });

  it('scores a project without requirements as zero coverage', () => {
    const result = optimizeAllocation({ project, requirements: [], assets, allocations: [] });

    expect(result.maxValue).toBe(0);
    expect(result.coverageScore).toBe(0);
    expect(result.selectedAssetIds).toEqual([]);
  });
});
