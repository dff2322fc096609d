// packages/game-core/src/simulator.ts
//
// Game loop: one secret answer, one strategy, a bounded number of turns.
//
// Each turn:
//   1. ask the strategy for a word, passing a frozen snapshot of the history
//   2. an exact match with the answer wins on this turn
//   3. otherwise the word must be in the dictionary (a strategy guessing an
//      unknown word is a contract violation and aborts the game)
//   4. score it and append the frozen record to the history
//
// Running out of turns is an ordinary outcome ("exhausted" / null), not an
// error. States: playing → won(turn) | exhausted.

import {
  simulatorOptionsSchema,
  type GameOutcome,
  type GuessRecord,
  type SimulatorOptions,
} from '@fivefold/protocol';
import type { Logger } from 'pino';

import { loadConfig, type Config } from './config.js';
import { defaultDictionary, loadDictionaryFile, type Dictionary } from './dictionary.js';
import { ContractViolationError } from './errors.js';
import { defaultLogger } from './logger.js';
import { computeFeedback, formatMask } from './scoring.js';
import { toStrategy, type StrategyLike } from './strategy.js';

export type SimulatorInit = SimulatorOptions & { logger?: Logger };

export class Simulator {
  readonly dictionary: Dictionary;
  readonly maxTurns: number;
  private readonly logger: Logger;

  constructor(dictionary: Dictionary, init: SimulatorInit = {}) {
    const { logger, ...options } = init;
    const parsed = simulatorOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ContractViolationError(
        'invalid-options',
        `Invalid simulator options: ${parsed.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ')}`,
        { options },
      );
    }
    this.dictionary = dictionary;
    this.maxTurns = parsed.data.maxTurns;
    this.logger = logger ?? defaultLogger();
  }

  /**
   * play runs one game and returns the winning turn (1-based), or null when
   * the strategy did not name the answer within `maxTurns`.
   */
  play(answer: string, strategy: StrategyLike): number | null {
    const outcome = this.playGame(answer, strategy);
    return outcome.status === 'won' ? outcome.turns : null;
  }

  /** Like play, but returns the full outcome including the scored history. */
  playGame(answer: string, strategy: StrategyLike): GameOutcome {
    const guesser = toStrategy(strategy);
    const history: GuessRecord[] = [];

    for (let turn = 1; turn <= this.maxTurns; turn++) {
      const guess = guesser.guess(Object.freeze([...history]));

      if (guess === answer) {
        this.logger.debug({ answer, turns: turn }, 'game won');
        const won: GameOutcome = {
          status: 'won',
          turns: turn,
          history: Object.freeze(history),
        };
        return Object.freeze(won);
      }

      if (!this.dictionary.has(guess)) {
        this.logger.error({ answer, guess, turn }, 'strategy guessed a word outside the dictionary');
        throw new ContractViolationError(
          'unknown-word',
          `turn ${turn}: "${guess}" is not in the dictionary`,
          { guess, turn },
        );
      }

      const mask = computeFeedback(answer, guess);
      history.push(Object.freeze({ word: guess, mask }));
      this.logger.debug({ turn, guess, mask: formatMask(mask) }, 'turn scored');
    }

    this.logger.debug({ answer, turns: this.maxTurns }, 'turn limit reached');
    const exhausted: GameOutcome = {
      status: 'exhausted',
      turns: this.maxTurns,
      history: Object.freeze(history),
    };
    return Object.freeze(exhausted);
  }
}

/**
 * createSimulator builds a Simulator from configuration: the dictionary at
 * DICTIONARY_FILE (or the bundled one) and SIM_MAX_TURNS as the turn limit.
 */
export function createSimulator(
  config: Config = loadConfig(),
  logger?: Logger,
): Simulator {
  const dictionary = config.dictionaryFile
    ? loadDictionaryFile(config.dictionaryFile)
    : defaultDictionary();
  (logger ?? defaultLogger()).debug(
    { words: dictionary.size, source: config.dictionaryFile ?? 'bundled' },
    'dictionary loaded',
  );
  return new Simulator(dictionary, { maxTurns: config.maxTurns, logger });
}
