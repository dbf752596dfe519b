import type { TrimResult, TrimStrategy } from '../types';
import { randomInt } from './random';
import type { Rng } from './random';

export const TRIM_STRATEGIES: readonly TrimStrategy[] = ['head', 'middle', 'tail', 'random'];

export function parseTrimStrategy(value: string): TrimStrategy {
  const lowered = value.toLowerCase();
  const match = TRIM_STRATEGIES.find((strategy) => strategy === lowered);
  if (!match) {
    throw new Error(`Unknown trim strategy '${value}' (expected ${TRIM_STRATEGIES.join('|')})`);
  }
  return match;
}

export function assertTrimTarget(target: number): void {
  if (!Number.isInteger(target) || target < 1) {
    throw new Error(`Trim target must be a positive integer, got ${target}`);
  }
}

function result<T>(strategy: TrimStrategy, target: number, items: readonly T[], start: number, kept: T[]): TrimResult<T> {
  return {
    strategy,
    target,
    items: kept,
    start,
    totalLength: items.length,
    keptLength: kept.length,
  };
}

export function trimHead<T>(items: readonly T[], target: number): TrimResult<T> {
  assertTrimTarget(target);
  return result('head', target, items, 0, items.slice(0, target));
}

export function trimTail<T>(items: readonly T[], target: number): TrimResult<T> {
  assertTrimTarget(target);
  const start = Math.max(0, items.length - target);
  return result('tail', target, items, start, items.slice(start));
}

/** Centered window starting at floor((total - target) / 2). */
export function trimMiddle<T>(items: readonly T[], target: number): TrimResult<T> {
  assertTrimTarget(target);
  if (target >= items.length) return result('middle', target, items, 0, items.slice());
  const start = Math.floor((items.length - target) / 2);
  return result('middle', target, items, start, items.slice(start, start + target));
}

/** Contiguous window at a uniform start in [0, total - target]. */
export function trimRandom<T>(items: readonly T[], target: number, rng: Rng): TrimResult<T> {
  assertTrimTarget(target);
  if (items.length <= target) return result('random', target, items, 0, items.slice());
  const start = randomInt(rng, 0, items.length - target);
  return result('random', target, items, start, items.slice(start, start + target));
}

export function trimSequence<T>(items: readonly T[], strategy: TrimStrategy, target: number, rng?: Rng): TrimResult<T> {
  switch (strategy) {
    case 'head':
      return trimHead(items, target);
    case 'middle':
      return trimMiddle(items, target);
    case 'tail':
      return trimTail(items, target);
    case 'random':
      if (!rng) {
        throw new Error('Random trimming needs a seeded generator');
      }
      return trimRandom(items, target, rng);
    default:
      throw new Error(`Unknown trim strategy '${String(strategy)}'`);
  }
}
