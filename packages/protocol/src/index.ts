// packages/protocol/src/index.ts
//
// Shared data shapes for the guessing-game simulator.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - LetterFeedback: per-letter evaluation ("correct", "misplaced", "absent").
//   - FeedbackMask:   exactly five LetterFeedback values, one per position.
//   - GuessRecord:    one turn of play (word + mask).
//   - GameOutcome:    "won" after N turns, or "exhausted" at the turn limit.
//   - SimulatorOptions: tunables accepted by the simulator.

import { z } from 'zod';

/** Number of letters in every answer and guess. */
export const WORD_LENGTH = 5;

/**
 * Turn limit used when none is configured. The real puzzle allows 6 guesses;
 * simulations allow more so score distributions are not cut off.
 */
export const DEFAULT_MAX_TURNS = 32;

/**
 * LetterFeedback schema:
 *  - "correct"   → letter matches the answer at this position
 *  - "misplaced" → letter occurs at another, not yet consumed, answer position
 *  - "absent"    → letter contributes to no match
 */
export const letterFeedbackSchema = z.enum(['correct', 'misplaced', 'absent']);
export type LetterFeedback = z.infer<typeof letterFeedbackSchema>;

export const feedbackMaskSchema = z
  .tuple([
    letterFeedbackSchema,
    letterFeedbackSchema,
    letterFeedbackSchema,
    letterFeedbackSchema,
    letterFeedbackSchema,
  ])
  .readonly();
export type FeedbackMask = z.infer<typeof feedbackMaskSchema>;

export const wordSchema = z.string().length(WORD_LENGTH);

/* -------------------------------------------------------------------------- */
/*                                Game records                                */
/* -------------------------------------------------------------------------- */

export const guessRecordSchema = z
  .object({
    word: wordSchema,
    mask: feedbackMaskSchema,
  })
  .readonly();
export type GuessRecord = z.infer<typeof guessRecordSchema>;

const historySchema = z.array(guessRecordSchema).readonly();

/** Ordered guesses made so far in one game, oldest first. */
export type History = z.infer<typeof historySchema>;

/**
 * Outcome of a single simulated game:
 *  - won:       the strategy named the answer on turn `turns` (1-based)
 *  - exhausted: every allowed turn was used without naming the answer
 *
 * `history` holds the scored wrong guesses; the winning guess is not scored
 * and therefore never appears in it.
 */
export const gameOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('won'),
    turns: z.number().int().min(1),
    history: historySchema,
  }),
  z.object({
    status: z.literal('exhausted'),
    turns: z.number().int().min(1),
    history: historySchema,
  }),
]);
export type GameOutcome = Readonly<z.infer<typeof gameOutcomeSchema>>;

/* -------------------------------------------------------------------------- */
/*                              Simulator options                             */
/* -------------------------------------------------------------------------- */

/**
 * Options for a simulator.
 *  - maxTurns: number of guesses allowed per game (≥ 1), defaults to 32
 */
export const simulatorOptionsSchema = z.object({
  maxTurns: z.number().int().min(1).default(DEFAULT_MAX_TURNS),
});
export type SimulatorOptions = z.input<typeof simulatorOptionsSchema>;
