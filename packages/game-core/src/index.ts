// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • scoring.ts    → feedback computation (computeFeedback, formatMask)
//   • dictionary.ts → allowed words + frequency table (parseDictionary, defaultDictionary)
//   • strategy.ts   → guesser contract (Strategy, toStrategy)
//   • simulator.ts  → game loop (Simulator, createSimulator)
//   • errors.ts     → ContractViolationError
//   • config.ts / logger.ts → environment config and the pino logger
//
// Example usage:
//   import { createSimulator } from '@fivefold/game-core';
//   const turns = createSimulator().play('crane', (history) => pickNext(history));

export * from './scoring.js';
export * from './dictionary.js';
export * from './strategy.js';
export * from './simulator.js';
export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export type {
  FeedbackMask,
  GameOutcome,
  GuessRecord,
  History,
  LetterFeedback,
  SimulatorOptions,
} from '@fivefold/protocol';
export { DEFAULT_MAX_TURNS, WORD_LENGTH } from '@fivefold/protocol';
