import { describe, it, expect } from 'vitest';
import {
  parseCapabilities,
  serializeCapabilities,
  satisfies,
  specMatch,
  meetsAll,
  strictlyDominates,
} from '../engine/matching/capability.js';
import { specs } from './setup.js';

describe('parseCapabilities', () => {
  it('keeps declared order and tags each value', () => {
    const map = parseCapabilities({
      ram_gb: 16,
      os: ' Linux ',
      ports: ['usb', 'hdmi'],
      gpu_count: '4',
      broken: null,
      nested: { a: 1 },
      ecc: true,
    });

    expect([...map.keys()]).toEqual(['ram_gb', 'os', 'ports', 'gpu_count', 'ecc']);
    expect(map.get('ram_gb')).toEqual({ kind: 'number', value: 16 });
    expect(map.get('os')).toEqual({ kind: 'string', value: 'Linux' });
    expect(map.get('ports')).toEqual({ kind: 'list', value: ['usb', 'hdmi'] });
    expect(map.get('gpu_count')).toEqual({ kind: 'number', value: 4 });
    expect(map.get('ecc')).toEqual({ kind: 'string', value: 'true' });
  });

  it('returns an empty map for non-object input', () => {
    expect(parseCapabilities(null).size).toBe(0);
    expect(parseCapabilities([1, 2]).size).toBe(0);
    expect(parseCapabilities('ram=16').size).toBe(0);
  });

  it('serializes back to plain JSON values', () => {
    expect(serializeCapabilities(specs({ ram_gb: '32', tags: ['a'] }))).toEqual({ ram_gb: 32, tags: ['a'] });
  });
});

describe('satisfies', () => {
  it('compares numbers with equal-or-greater', () => {
    expect(satisfies({ kind: 'number', value: 16 }, { kind: 'number', value: 16 })).toBe(true);
    expect(satisfies({ kind: 'number', value: 8 }, { kind: 'number', value: 16 })).toBe(false);
  });

  it('compares strings case-insensitively and by membership in a list', () => {
    expect(satisfies({ kind: 'string', value: 'Linux' }, { kind: 'string', value: 'linux' })).toBe(true);
    expect(satisfies({ kind: 'list', value: ['USB', 'hdmi'] }, { kind: 'string', value: 'usb' })).toBe(true);
    expect(satisfies({ kind: 'string', value: 'windows' }, { kind: 'string', value: 'linux' })).toBe(false);
  });

  it('requires every listed item for list constraints', () => {
    expect(satisfies({ kind: 'list', value: ['a', 'b', 'c'] }, { kind: 'list', value: ['c', 'a'] })).toBe(true);
    expect(satisfies({ kind: 'list', value: ['a'] }, { kind: 'list', value: ['a', 'b'] })).toBe(false);
  });

  it('fails on missing fields and mismatched kinds', () => {
    expect(satisfies(undefined, { kind: 'number', value: 1 })).toBe(false);
    expect(satisfies({ kind: 'string', value: '16gb' }, { kind: 'number', value: 16 })).toBe(false);
  });
});

describe('specMatch', () => {
  it('is 1 when nothing is required', () => {
    expect(specMatch(specs({ ram_gb: 8 }), new Map())).toBe(1);
  });

  it('is the fraction of requested fields satisfied', () => {
    const asset = specs({ ram_gb: 8, os: 'Linux' });
    const required = specs({ ram_gb: 16, os: 'linux' });
    expect(specMatch(asset, required)).toBe(0.5);
    expect(meetsAll(asset, required)).toBe(false);
    expect(meetsAll(specs({ ram_gb: 32, os: 'LINUX' }), required)).toBe(true);
  });
});

describe('strictlyDominates', () => {
  it('needs >= on every shared numeric field and > on one', () => {
    expect(strictlyDominates(specs({ ram_gb: 16, cpus: 8 }), specs({ ram_gb: 16, cpus: 4 }))).toBe(true);
    expect(strictlyDominates(specs({ ram_gb: 16, cpus: 4 }), specs({ ram_gb: 16, cpus: 4 }))).toBe(false);
    expect(strictlyDominates(specs({ ram_gb: 32, cpus: 2 }), specs({ ram_gb: 16, cpus: 4 }))).toBe(false);
  });

  it('is false without a comparable numeric field', () => {
    expect(strictlyDominates(specs({ os: 'linux' }), specs({ os: 'linux' }))).toBe(false);
    expect(strictlyDominates(specs({ ram_gb: 64 }), specs({ cpus: 4 }))).toBe(false);
  });
});
