import { describe, it, expect } from 'vitest';
import { findUpgradePath } from '../engine/matching/upgrade-path.js';
import { mockData, specs } from './setup.js';

describe('findUpgradePath', () => {
  const base = mockData.asset({ id: 'a-base', specifications: specs({ ram_gb: 8 }) });
  const mid = mockData.asset({ id: 'b-mid', specifications: specs({ ram_gb: 16, cpus: 4 }) });
  const top = mockData.asset({ id: 'c-top', specifications: specs({ cpus: 8, disk_gb: 500 }) });
  const side = mockData.asset({ id: 'd-side', specifications: specs({ ram_gb: 4, cpus: 2 }) });
  const other = mockData.asset({ id: 'e-other', categoryId: 'cat-cpu', specifications: specs({ ram_gb: 64 }) });
  const pool = [base, mid, top, side, other];

  it('walks a chain of strict upgrades to the target asset', () => {
    expect(findUpgradePath(base, { assetId: 'c-top' }, pool)).toEqual(['a-base', 'b-mid', 'c-top']);
  });

  it('stops at the first asset meeting a capability target', () => {
    expect(findUpgradePath(base, { capability: specs({ cpus: 8 }) }, pool)).toEqual(['a-base', 'b-mid', 'c-top']);
    expect(findUpgradePath(base, { capability: specs({ ram_gb: 16 }) }, pool)).toEqual(['a-base', 'b-mid']);
  });

  it('returns just the source when it already qualifies', () => {
    expect(findUpgradePath(mid, { capability: specs({ ram_gb: 16 }) }, pool)).toEqual(['b-mid']);
  });

  it('returns an empty path when the target is not an upgrade', () => {
    expect(findUpgradePath(base, { assetId: 'd-side' }, pool)).toEqual([]);
  });

  it('stays within the source category', () => {
    expect(findUpgradePath(base, { assetId: 'e-other' }, pool)).toEqual([]);
  });
});
