import type {
  Allocation,
  Asset,
  Project,
  Requirement,
  RequirementPriority,
} from '../../snapshot/types.js';
import { meetsAll, specMatch } from './capability.js';
import { compareIds } from './order.js';
import { findUpgradePath } from './upgrade-path.js';

export const PRIORITY_WEIGHTS: Readonly<Record<RequirementPriority, number>> = {
  required: 3,
  preferred: 2,
  optional: 1,
};

/** Upper bound on discretised budget steps (DP table width). */
export const MAX_BUDGET_STEPS = 2000;

const VALUE_EPSILON = 1e-9;

export interface OptimizerInput {
  project: Project;
  requirements: readonly Requirement[];
  /** Full inventory; eligibility is decided here. */
  assets: readonly Asset[];
  /** Used to find assets already allocated to this project. */
  allocations: readonly Allocation[];
  /** Overrides the project's daily budget. */
  budget?: number;
}

export interface RequirementFulfilment {
  readonly requirementId: string;
  readonly categoryId: string;
  readonly priority: RequirementPriority;
  readonly quantityNeeded: number;
  readonly selectedAssetIds: string[];
  readonly achievedValue: number;
  readonly maxValue: number;
  /** Upgrade chain towards the min-spec when no selected asset meets it. */
  readonly upgradePath: string[];
}

export interface OptimizationResult {
  readonly selectedAssetIds: string[];
  readonly coverageScore: number;
  readonly totalCostPerDay: number;
  readonly achievedValue: number;
  readonly maxValue: number;
  readonly budget: number;
  readonly budgetStep: number;
  readonly requirements: RequirementFulfilment[];
}

/** A selected asset and the requirement it is counted against. */
interface Item {
  asset: Asset;
  requirementId: string;
  value: number;
}

interface Candidate {
  asset: Asset;
  weight: number; // in budget steps
  /** Value towards each requirement of its group; 0 where it cannot serve one. */
  values: number[];
}

/**
 * Requirements sharing a category, solved jointly so an asset is counted
 * against at most one of them.
 */
interface RequirementGroup {
  requirementIds: string[];
  /** Per requirement, capped at the candidates able to serve it. */
  quantities: number[];
  candidates: Candidate[];
}

/** Upper bound on trace cells (states x budget steps x candidates) for a joint group. */
const MAX_GROUP_TRACE_CELLS = 1 << 24;

/** Smallest power-of-ten step keeping the table within MAX_BUDGET_STEPS. */
export function budgetStepFor(budget: number): number {
  let step = 1;
  while (budget / step > MAX_BUDGET_STEPS) {
    step *= 10;
  }
  return step;
}

function isEligible(asset: Asset, projectId: string, activeByAsset: ReadonlyMap<string, Allocation>): boolean {
  if (asset.status === 'available') return true;
  if (asset.status !== 'in_use') return false;
  return activeByAsset.get(asset.id)?.projectId === projectId;
}

function stateCount(quantities: readonly number[]): number {
  return quantities.reduce((product, q) => product * (q + 1), 1);
}

function makeGroup(requirements: readonly Requirement[], candidates: Candidate[]): RequirementGroup | null {
  const quantities = requirements.map((r, i) =>
    Math.min(Math.max(0, r.quantityNeeded), candidates.filter((c) => c.values[i] > 0).length),
  );
  const kept = requirements.map((_, i) => i).filter((i) => quantities[i] > 0);
  const usable = candidates
    .map((c) => ({ ...c, values: kept.map((i) => c.values[i]) }))
    .filter((c) => c.values.some((v) => v > 0))
    .sort((a, b) => {
      const best = Math.max(...b.values) - Math.max(...a.values);
      return best || a.asset.costPerDay - b.asset.costPerDay || compareIds(a.asset.id, b.asset.id);
    });
  if (kept.length === 0 || usable.length === 0) return null;
  return {
    requirementIds: kept.map((i) => requirements[i].id),
    quantities: kept.map((i) => quantities[i]),
    candidates: usable,
  };
}

/**
 * One group per category. Worthless assets (no spec field matched) are
 * dropped. A category whose joint table would exceed MAX_GROUP_TRACE_CELLS
 * falls back to one group per requirement, each asset going to the
 * requirement where it is worth the most.
 */
function buildGroups(
  requirements: readonly Requirement[],
  eligible: readonly Asset[],
  step: number,
  width: number,
): RequirementGroup[] {
  const byCategory = new Map<string, Requirement[]>();
  for (const requirement of requirements) {
    const list = byCategory.get(requirement.categoryId) ?? [];
    list.push(requirement);
    byCategory.set(requirement.categoryId, list);
  }

  const groups: RequirementGroup[] = [];
  for (const categoryId of [...byCategory.keys()].sort(compareIds)) {
    const members = byCategory.get(categoryId) ?? [];
    const candidates: Candidate[] = eligible
      .filter((asset) => asset.categoryId === categoryId)
      .map((asset) => ({
        asset,
        weight: Math.max(0, Math.ceil(asset.costPerDay / step - VALUE_EPSILON)),
        values: members.map((r) => {
          const value = PRIORITY_WEIGHTS[r.priority] * specMatch(asset.specifications, r.minSpec);
          return value > VALUE_EPSILON ? value : 0;
        }),
      }));

    const joint = makeGroup(members, candidates);
    if (!joint) continue;
    if (
      joint.requirementIds.length === 1 ||
      stateCount(joint.quantities) * width * joint.candidates.length <= MAX_GROUP_TRACE_CELLS
    ) {
      groups.push(joint);
      continue;
    }

    members.forEach((requirement, i) => {
      const own = candidates.filter((c) => {
        const best = c.values.reduce((top, v, j) => (v > c.values[top] + VALUE_EPSILON ? j : top), 0);
        return best === i;
      });
      const single = makeGroup([requirement], own.map((c) => ({ ...c, values: [c.values[i]] })));
      if (single) groups.push(single);
    });
  }
  return groups;
}

// ─── Knapsack ────────────────────────────────────────────────────────────────

/** DP cells: best value and, among equal values, least real cost. */
interface Layer {
  value: Float64Array;
  cost: Float64Array;
}

function makeLayer(size: number, fill: number): Layer {
  return { value: new Float64Array(size).fill(fill), cost: new Float64Array(size) };
}

function improves(value: number, cost: number, layer: Layer, index: number): boolean {
  const current = layer.value[index];
  if (current === -Infinity) return true;
  if (value > current + VALUE_EPSILON) return true;
  return Math.abs(value - current) <= VALUE_EPSILON && cost < layer.cost[index] - VALUE_EPSILON;
}

interface GroupTrace {
  group: RequirementGroup;
  strides: number[];
  /** keep[t][s * width + w] = r + 1 when candidate t was taken for requirement r to reach (s, w). */
  keep: Uint8Array[];
  /** Count state chosen from this group for each total capacity w. */
  chosenState: Int32Array;
}

/**
 * 0/1 knapsack over requirement groups. Within a group the state s encodes,
 * in mixed radix, how many candidates each requirement has taken, so no
 * requirement value-counts more than its quantity and each candidate serves
 * at most one requirement.
 */
function solve(groups: readonly RequirementGroup[], capacity: number): Item[] {
  const width = capacity + 1;
  let global = makeLayer(width, 0);
  const traces: GroupTrace[] = [];

  for (const group of groups) {
    const { quantities, candidates } = group;
    const strides: number[] = [];
    let states = 1;
    for (const q of quantities) {
      strides.push(states);
      states *= q + 1;
    }

    const table = makeLayer(states * width, -Infinity);
    table.value.set(global.value);
    table.cost.set(global.cost);
    const keep: Uint8Array[] = [];

    for (const candidate of candidates) {
      const taken = new Uint8Array(states * width);
      // Sources always sit in a lower state, so a descending sweep reads each
      // one before this candidate can have touched it.
      for (let s = states - 1; s > 0; s--) {
        for (let r = 0; r < quantities.length; r++) {
          const gain = candidate.values[r];
          if (gain <= 0) continue;
          if (Math.floor(s / strides[r]) % (quantities[r] + 1) === 0) continue;
          const from = (s - strides[r]) * width;
          for (let w = capacity; w >= candidate.weight; w--) {
            const source = from + w - candidate.weight;
            const prior = table.value[source];
            if (prior === -Infinity) continue;
            const value = prior + gain;
            const cost = table.cost[source] + candidate.asset.costPerDay;
            const target = s * width + w;
            if (improves(value, cost, table, target)) {
              table.value[target] = value;
              table.cost[target] = cost;
              taken[target] = r + 1;
            }
          }
        }
      }
      keep.push(taken);
    }

    const merged = makeLayer(width, -Infinity);
    const chosenState = new Int32Array(width);
    for (let w = 0; w < width; w++) {
      for (let s = 0; s < states; s++) {
        const index = s * width + w;
        if (table.value[index] === -Infinity) continue;
        if (improves(table.value[index], table.cost[index], merged, w)) {
          merged.value[w] = table.value[index];
          merged.cost[w] = table.cost[index];
          chosenState[w] = s;
        }
      }
    }

    traces.push({ group, strides, keep, chosenState });
    global = merged;
  }

  const selected: Item[] = [];
  let w = capacity;
  for (let g = traces.length - 1; g >= 0; g--) {
    const { group, strides, keep, chosenState } = traces[g];
    let s = chosenState[w];
    for (let t = group.candidates.length - 1; t >= 0 && s > 0; t--) {
      const r = keep[t][s * width + w] - 1;
      if (r < 0) continue;
      const candidate = group.candidates[t];
      selected.push({ asset: candidate.asset, requirementId: group.requirementIds[r], value: candidate.values[r] });
      s -= strides[r];
      w -= candidate.weight;
    }
  }
  return selected;
}

// ─── Entry point ─────────────────────────────────────────────────────────────

/**
 * Pick the asset subset that maximises priority-weighted spec coverage of a
 * project's requirements within its daily budget.
 */
export function optimizeAllocation(input: OptimizerInput): OptimizationResult {
  const { project, allocations } = input;
  const budget = Math.max(0, input.budget ?? project.budget);
  const step = budgetStepFor(budget);
  const capacity = Math.floor(budget / step);

  const requirements = [...input.requirements].sort((a, b) => compareIds(a.id, b.id));
  const maxValue = requirements.reduce(
    (sum, r) => sum + PRIORITY_WEIGHTS[r.priority] * Math.max(0, r.quantityNeeded),
    0,
  );

  const activeByAsset = new Map<string, Allocation>();
  for (const allocation of allocations) {
    if (allocation.releasedAt === null && allocation.status !== 'released') {
      activeByAsset.set(allocation.assetId, allocation);
    }
  }

  const categories = new Set(requirements.map((r) => r.categoryId));
  const eligible = input.assets.filter(
    (a) => a.categoryId !== null && categories.has(a.categoryId) && isEligible(a, project.id, activeByAsset),
  );

  const groups = budget > 0 ? buildGroups(requirements, eligible, step, capacity + 1) : [];
  const selected = solve(groups, capacity).sort((a, b) => compareIds(a.asset.id, b.asset.id));

  const achievedValue = selected.reduce((sum, item) => sum + item.value, 0);
  const totalCost = selected.reduce((sum, item) => sum + item.asset.costPerDay, 0);
  const pool = input.assets.filter((a) => a.status !== 'retired');

  const fulfilment: RequirementFulfilment[] = requirements.map((requirement) => {
    const picks = selected.filter((item) => item.requirementId === requirement.id);
    const needsUpgrade =
      requirement.minSpec.size > 0 && !picks.some((p) => meetsAll(p.asset.specifications, requirement.minSpec));

    let upgradePath: string[] = [];
    if (needsUpgrade) {
      const source = eligible
        .filter((a) => a.categoryId === requirement.categoryId)
        .map((asset) => ({ asset, match: specMatch(asset.specifications, requirement.minSpec) }))
        .sort(
          (a, b) =>
            b.match - a.match || a.asset.costPerDay - b.asset.costPerDay || compareIds(a.asset.id, b.asset.id),
        )[0];
      if (source) {
        upgradePath = findUpgradePath(source.asset, { capability: requirement.minSpec }, pool);
      }
    }

    return {
      requirementId: requirement.id,
      categoryId: requirement.categoryId,
      priority: requirement.priority,
      quantityNeeded: requirement.quantityNeeded,
      selectedAssetIds: picks.map((p) => p.asset.id),
      achievedValue: picks.reduce((sum, p) => sum + p.value, 0),
      maxValue: PRIORITY_WEIGHTS[requirement.priority] * Math.max(0, requirement.quantityNeeded),
      upgradePath,
    };
  });

  return {
    selectedAssetIds: selected.map((item) => item.asset.id),
    coverageScore: maxValue > 0 ? Math.min(1, Math.max(0, achievedValue / maxValue)) : 0,
    totalCostPerDay: Math.round(totalCost * 100) / 100,
    achievedValue,
    maxValue,
    budget,
    budgetStep: step,
    requirements: fulfilment,
  };
}
