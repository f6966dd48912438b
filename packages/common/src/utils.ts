import { Coordinates, ResourceInput, ResourceVector } from './types.js';

export const RESOURCE_DIMENSIONS = ['cpu', 'memory', 'disk'] as const;

export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function distance(a: Coordinates, b: Coordinates): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

export function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function toResourceVector(input: ResourceInput): ResourceVector {
  if (typeof input === 'number') {
    return { cpu: input, memory: input, disk: input };
  }
  return { ...input };
}

export function zeroResources(): ResourceVector {
  return { cpu: 0, memory: 0, disk: 0 };
}

export function addResources(a: ResourceVector, b: ResourceVector): ResourceVector {
  return { cpu: a.cpu + b.cpu, memory: a.memory + b.memory, disk: a.disk + b.disk };
}

export function subtractResources(a: ResourceVector, b: ResourceVector): ResourceVector {
  return { cpu: a.cpu - b.cpu, memory: a.memory - b.memory, disk: a.disk - b.disk };
}

export function fitsWithin(amount: ResourceVector, limit: ResourceVector): boolean {
  return RESOURCE_DIMENSIONS.every((dim) => amount[dim] <= limit[dim]);
}

export function isZeroResources(amount: ResourceVector): boolean {
  return RESOURCE_DIMENSIONS.every((dim) => amount[dim] === 0);
}

/**
 * Occupation of the most loaded dimension, as a percentage of capacity.
 * Dimensions without capacity are ignored.
 */
export function occupationRate(allocation: ResourceVector, capacity: ResourceVector): number {
  let rate = 0;
  for (const dim of RESOURCE_DIMENSIONS) {
    if (capacity[dim] > 0) {
      rate = Math.max(rate, (allocation[dim] * 100) / capacity[dim]);
    }
  }
  return rate;
}

export function formatResources(amount: ResourceVector): string {
  return `cpu=${amount.cpu} memory=${amount.memory} disk=${amount.disk}`;
}
