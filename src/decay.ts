import {
  CLEAR_MIN_SIGNIFICANCE,
  CLEAR_RECALL,
  DECAY_RATES,
  FUZZY_RECALL,
  RECALL_BOOST,
  WEEK_SECONDS,
  type MemoryCategory,
  type MemoryState,
} from '../config.js';

export type DecayInput = {
  category: MemoryCategory;
  significance: number;
  recall: number;
  lastDecayAt: number;
};

export type DecayOutcome = {
  recall: number;
  lastDecayAt: number;
  weeks: number;
};

export function isDecayEligible(category: MemoryCategory): boolean {
  switch (category) {
    case 'decision':
    case 'session':
      return true;
    case 'knowledge':
    case 'current_state':
      return false;
    default: {
      const unreachable: never = category;
      throw new Error(`unknown category: ${String(unreachable)}`);
    }
  }
}

export function decayRate(significance: number): number {
  const rate = DECAY_RATES[significance];
  if (rate === undefined) {
    throw new RangeError(`significance out of range: ${significance}`);
  }
  return rate;
}

export function clampRecall(recall: number): number {
  if (Number.isNaN(recall)) return 0;
  return Math.min(1, Math.max(0, recall));
}

export function weeksElapsed(lastDecayAt: number, nowSec: number): number {
  if (nowSec <= lastDecayAt) return 0;
  return Math.floor((nowSec - lastDecayAt) / WEEK_SECONDS);
}

/**
 * Apply every whole week of decay owed since `lastDecayAt`. The anchor moves
 * forward by whole weeks only, so the fractional remainder carries over and a
 * second call inside the same week changes nothing.
 *
 * Both the read-time view and the persisted decay pass go through here.
 */
export function applyDecay(input: DecayInput, nowSec: number): DecayOutcome {
  const weeks = weeksElapsed(input.lastDecayAt, nowSec);
  const lastDecayAt = input.lastDecayAt + weeks * WEEK_SECONDS;

  if (!isDecayEligible(input.category)) {
    return { recall: 1, lastDecayAt, weeks };
  }
  if (weeks === 0) {
    return { recall: clampRecall(input.recall), lastDecayAt, weeks };
  }

  const factor = Math.pow(1 - decayRate(input.significance), weeks);
  return { recall: clampRecall(input.recall * factor), lastDecayAt, weeks };
}

export function boostRecall(recall: number): number {
  return clampRecall(Math.min(1, recall + RECALL_BOOST));
}

export function classifyState(recall: number, significance: number): MemoryState {
  if (recall >= CLEAR_RECALL && significance >= CLEAR_MIN_SIGNIFICANCE) return 'clear';
  if (recall >= FUZZY_RECALL) return 'fuzzy';
  return 'blank';
}
