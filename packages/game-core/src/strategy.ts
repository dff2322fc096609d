// packages/game-core/src/strategy.ts
//
// Contract for pluggable guessers. The simulator asks for one word per turn,
// handing over everything scored so far. Any selection algorithm is the
// strategy's own business; the only rule is that each word it returns must
// be in the dictionary or be the answer itself.

import type { History } from '@fivefold/protocol';

export interface Strategy {
  guess(history: History): string;
}

export type GuessFn = (history: History) => string;

/** Either a Strategy object or a bare guess function. */
export type StrategyLike = Strategy | GuessFn;

export function toStrategy(s: StrategyLike): Strategy {
  return typeof s === 'function' ? { guess: s } : s;
}
