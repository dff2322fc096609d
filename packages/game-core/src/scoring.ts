// packages/game-core/src/scoring.ts
//
// Feedback computation for one guess against the answer.
// Implements the standard two-pass algorithm:
//
//   Pass 1: exact position matches become "correct" and consume that
//           answer position.
//   Pass 2: every other guess letter takes the FIRST unconsumed answer
//           position holding the same letter ("misplaced"), or is "absent".
//
// Consumption is what keeps repeated letters honest: a letter guessed twice
// against an answer containing it once earns one non-absent mark, never two.
//
// Comparison is exact (no case folding); callers normalize words upstream.

import {
  WORD_LENGTH,
  wordSchema,
  type FeedbackMask,
  type LetterFeedback,
} from '@fivefold/protocol';

import { ContractViolationError } from './errors.js';

type MaskSlots = [
  LetterFeedback,
  LetterFeedback,
  LetterFeedback,
  LetterFeedback,
  LetterFeedback,
];

function assertWordLength(role: 'answer' | 'guess', word: string): void {
  if (!wordSchema.safeParse(word).success) {
    throw new ContractViolationError(
      'word-length',
      `${role} must be ${WORD_LENGTH} letters, got "${word}" (${word.length})`,
      { role, word },
    );
  }
}

/**
 * computeFeedback scores `guess` against `answer`.
 *
 * Throws ContractViolationError("word-length") unless both words have exactly
 * five characters; the simulator relies on upstream validation, so this is a
 * precondition check rather than a recoverable error.
 *
 * Example:
 *   answer = "aabbb", guess = "ccaac"
 *   → ["absent", "absent", "misplaced", "misplaced", "absent"]
 */
export function computeFeedback(answer: string, guess: string): FeedbackMask {
  assertWordLength('answer', answer);
  assertWordLength('guess', guess);

  const marks: MaskSlots = ['absent', 'absent', 'absent', 'absent', 'absent'];
  const used = [false, false, false, false, false];

  for (let i = 0; i < WORD_LENGTH; i++) {
    if (guess[i] === answer[i]) {
      marks[i] = 'correct';
      used[i] = true;
    }
  }

  for (let i = 0; i < WORD_LENGTH; i++) {
    if (marks[i] === 'correct') continue;
    for (let j = 0; j < WORD_LENGTH; j++) {
      if (!used[j] && answer[j] === guess[i]) {
        used[j] = true;
        marks[i] = 'misplaced';
        break;
      }
    }
  }

  return Object.freeze(marks);
}

/** True when every position is "correct". */
export function isSolvedMask(mask: FeedbackMask): boolean {
  return mask.every((m) => m === 'correct');
}

/**
 * formatMask renders a mask compactly for logs:
 * "G" correct, "?" misplaced, "-" absent (e.g. "G?--G").
 */
export function formatMask(mask: FeedbackMask): string {
  return mask
    .map((m) => (m === 'correct' ? 'G' : m === 'misplaced' ? '?' : '-'))
    .join('');
}
