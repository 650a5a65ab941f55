import type { CapabilityMap, SpecValue } from '../../snapshot/types.js';

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

function toSpecValue(raw: unknown): SpecValue | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { kind: 'number', value: raw } : null;
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (NUMERIC_STRING.test(trimmed)) {
      return { kind: 'number', value: Number(trimmed) };
    }
    return { kind: 'string', value: trimmed };
  }
  if (typeof raw === 'boolean') {
    return { kind: 'string', value: String(raw) };
  }
  if (Array.isArray(raw)) {
    const items = raw
      .filter((item): item is string | number | boolean =>
        ['string', 'number', 'boolean'].includes(typeof item),
      )
      .map((item) => String(item).trim());
    return { kind: 'list', value: items };
  }
  return null;
}

/**
 * Build a capability map from a free-form JSON specification object.
 * Keys keep their declared order; values that are neither scalars nor
 * lists of scalars (null, nested objects) are dropped.
 */
export function parseCapabilities(raw: unknown): CapabilityMap {
  const map = new Map<string, SpecValue>();
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    return map;
  }
  for (const [key, value] of Object.entries(raw)) {
    const spec = toSpecValue(value);
    if (spec) {
      map.set(key, spec);
    }
  }
  return map;
}

/** Inverse of parseCapabilities, for JSON output and storage. */
export function serializeCapabilities(map: CapabilityMap): Record<string, number | string | string[]> {
  const out: Record<string, number | string | string[]> = {};
  for (const [key, spec] of map) {
    out[key] = spec.kind === 'list' ? [...spec.value] : spec.value;
  }
  return out;
}

const fold = (s: string) => s.toLowerCase();

/**
 * Whether an asset's value for a field meets a requested value.
 *  - number: equal or greater
 *  - string: case-insensitive equality (or membership when the asset holds a list)
 *  - list:   every requested item present
 */
export function satisfies(actual: SpecValue | undefined, required: SpecValue): boolean {
  if (!actual) return false;

  switch (required.kind) {
    case 'number':
      return actual.kind === 'number' && actual.value >= required.value;
    case 'string': {
      const wanted = fold(required.value);
      if (actual.kind === 'string') return fold(actual.value) === wanted;
      if (actual.kind === 'list') return actual.value.some((v) => fold(v) === wanted);
      return false;
    }
    case 'list': {
      if (actual.kind === 'list') {
        const held = new Set(actual.value.map(fold));
        return required.value.every((v) => held.has(fold(v)));
      }
      if (actual.kind === 'string') {
        const held = fold(actual.value);
        return required.value.every((v) => fold(v) === held);
      }
      return false;
    }
  }
}

/**
 * Fraction of requested fields the asset satisfies, in [0, 1].
 * No requested fields means a perfect match.
 */
export function specMatch(asset: CapabilityMap, required: CapabilityMap): number {
  if (required.size === 0) return 1;
  let met = 0;
  for (const [key, value] of required) {
    if (satisfies(asset.get(key), value)) met++;
  }
  return met / required.size;
}

export function meetsAll(asset: CapabilityMap, required: CapabilityMap): boolean {
  return specMatch(asset, required) === 1;
}

/**
 * True when `candidate` is a strict upgrade of `base`: they share at least one
 * numeric field, candidate is >= on every shared numeric field and > on one.
 */
export function strictlyDominates(candidate: CapabilityMap, base: CapabilityMap): boolean {
  let comparable = 0;
  let better = false;
  for (const [key, baseValue] of base) {
    const candidateValue = candidate.get(key);
    if (baseValue.kind !== 'number' || candidateValue?.kind !== 'number') continue;
    comparable++;
    if (candidateValue.value < baseValue.value) return false;
    if (candidateValue.value > baseValue.value) better = true;
  }
  return comparable > 0 && better;
}
