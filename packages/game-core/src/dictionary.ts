// packages/game-core/src/dictionary.ts
//
// The set of words a strategy may guess, plus each word's frequency weight.
//
// Source format: one entry per line, "word<space>frequency", e.g.
//
//   which 4188
//   there 3602
//
// The frequency table is carried for strategies; the core never interprets it.
// A Dictionary is frozen once built and can be shared by any number of
// simulators.

import fs from 'node:fs';
import { z } from 'zod';

import { ContractViolationError } from './errors.js';

const frequencySchema = z
  .string()
  .regex(/^\d+$/, 'frequency must be a non-negative integer')
  .transform(Number);

export class Dictionary {
  readonly #entries: ReadonlyMap<string, number>;

  constructor(entries: Iterable<readonly [word: string, frequency: number]>) {
    this.#entries = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.#entries.size;
  }

  has(word: string): boolean {
    return this.#entries.has(word);
  }

  frequency(word: string): number | undefined {
    return this.#entries.get(word);
  }

  /** Words in source order. */
  words(): string[] {
    return [...this.#entries.keys()];
  }

  /** A copy of the word → frequency table; changing it leaves the dictionary intact. */
  frequencies(): ReadonlyMap<string, number> {
    return new Map(this.#entries);
  }
}

/**
 * parseDictionary builds a Dictionary from "word frequency" lines.
 *
 * Lines split on the first space. A missing separator, an empty word or a
 * frequency that is not a decimal integer throws
 * ContractViolationError("malformed-dictionary") naming the 1-based line.
 * A trailing newline at the end of the text is allowed; any other blank line
 * is malformed. If a word repeats, its last frequency wins.
 */
export function parseDictionary(text: string): Dictionary {
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  const entries: Array<[string, number]> = [];
  lines.forEach((raw, idx) => {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    const lineNo = idx + 1;
    const sep = line.indexOf(' ');
    if (sep <= 0) {
      throw new ContractViolationError(
        'malformed-dictionary',
        `dictionary line ${lineNo}: expected "word frequency", got "${line}"`,
        { line: lineNo, text: line },
      );
    }
    const word = line.slice(0, sep);
    const freq = frequencySchema.safeParse(line.slice(sep + 1));
    if (!freq.success) {
      throw new ContractViolationError(
        'malformed-dictionary',
        `dictionary line ${lineNo}: frequency of "${word}" is not a number`,
        { line: lineNo, text: line },
      );
    }
    entries.push([word, freq.data]);
  });

  return new Dictionary(entries);
}

/** Read and parse a UTF-8 dictionary file. */
export function loadDictionaryFile(path: string | URL): Dictionary {
  return parseDictionary(fs.readFileSync(path, 'utf8'));
}

const BUNDLED_DICTIONARY = new URL('../data/dictionary.txt', import.meta.url);

let bundled: Dictionary | undefined;

/** The dictionary shipped with this package, loaded once per process. */
export function defaultDictionary(): Dictionary {
  bundled ??= loadDictionaryFile(BUNDLED_DICTIONARY);
  return bundled;
}
