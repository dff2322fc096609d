// packages/game-core/src/__tests__/dictionary.test.ts
//
// Unit tests for parseDictionary(), loadDictionaryFile() and the bundled list.

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { pino } from 'pino';

import {
  Dictionary,
  Simulator,
  defaultDictionary,
  isContractViolation,
  loadDictionaryFile,
  parseDictionary,
} from '../index.js';

/** Run fn and return what it throws (fails the test if nothing is thrown). */
function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected a throw');
}

describe('parseDictionary', () => {
  it('reads "word frequency" lines in order', () => {
    const dict = parseDictionary('right 10\nwrong 5\n');
    expect(dict.size).toBe(2);
    expect(dict.words()).toEqual(['right', 'wrong']);
    expect(dict.has('wrong')).toBe(true);
    expect(dict.has('wrung')).toBe(false);
    expect(dict.frequency('right')).toBe(10);
    expect(dict.frequency('wrung')).toBeUndefined();
  });

  it('exposes the frequency table read-only', () => {
    const table = parseDictionary('right 10\nwrong 5').frequencies();
    expect([...table.entries()]).toEqual([
      ['right', 10],
      ['wrong', 5],
    ]);
  });

  it('hands out a copy of the frequency table that cannot change the dictionary', () => {
    const dict = parseDictionary('right 10\nwrong 5\n');
    const table = dict.frequencies();
    if (table instanceof Map) {
      table.delete('wrong');
      table.set('wrung', 1);
    }

    expect(dict.has('wrong')).toBe(true);
    expect(dict.has('wrung')).toBe(false);
    expect(dict.size).toBe(2);
    expect(dict.frequencies().get('wrong')).toBe(5);
    expect(new Simulator(dict, { logger: pino({ level: 'silent' }) }).play('right', () => 'wrong')).toBeNull();
  });

  it('accepts CRLF line endings and a missing final newline', () => {
    const dict = parseDictionary('right 10\r\nwrong 5');
    expect(dict.frequency('right')).toBe(10);
    expect(dict.frequency('wrong')).toBe(5);
  });

  it('keeps the last frequency of a repeated word', () => {
    const dict = parseDictionary('right 1\nright 9\n');
    expect(dict.size).toBe(1);
    expect(dict.frequency('right')).toBe(9);
  });

  it('treats empty text as an empty dictionary', () => {
    expect(parseDictionary('').size).toBe(0);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(parseDictionary('right 1'))).toBe(true);
  });

  it('rejects a line without a separator, naming the line', () => {
    const err = thrownBy(() => parseDictionary('right 10\nwrong\n'));
    expect(isContractViolation(err, 'malformed-dictionary')).toBe(true);
    expect(err).toHaveProperty(
      'message',
      'dictionary line 2: expected "word frequency", got "wrong"',
    );
    expect(err).toHaveProperty('details', { line: 2, text: 'wrong' });
  });

  it('rejects a blank line in the middle of the list', () => {
    const err = thrownBy(() => parseDictionary('right 1\n\nwrong 2\n'));
    expect(isContractViolation(err, 'malformed-dictionary')).toBe(true);
    expect(err).toHaveProperty('details', { line: 2, text: '' });
  });

  it('rejects a line with an empty word', () => {
    const err = thrownBy(() => parseDictionary(' 12'));
    expect(isContractViolation(err, 'malformed-dictionary')).toBe(true);
  });

  it.each(['right ten', 'right -3', 'right 1.5', 'right ', 'right 10 extra'])(
    'rejects a non-numeric frequency in %j',
    (line) => {
      const err = thrownBy(() => parseDictionary(line));
      expect(isContractViolation(err, 'malformed-dictionary')).toBe(true);
      expect(err).toHaveProperty(
        'message',
        'dictionary line 1: frequency of "right" is not a number',
      );
    },
  );
});

describe('loadDictionaryFile', () => {
  it('parses a file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fivefold-dict-'));
    const file = path.join(dir, 'words.txt');
    fs.writeFileSync(file, 'plumb 3\nglyph 1\n');
    try {
      const dict = loadDictionaryFile(file);
      expect(dict).toBeInstanceOf(Dictionary);
      expect(dict.words()).toEqual(['plumb', 'glyph']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('defaultDictionary', () => {
  it('loads the bundled five-letter list once', () => {
    const dict = defaultDictionary();
    expect(dict).toBe(defaultDictionary());
    expect(dict.size).toBe(131);
    expect(dict.has('crane')).toBe(true);
    expect(dict.has('right')).toBe(true);
    expect(dict.has('wrong')).toBe(true);
    expect(dict.words().every((w) => w.length === 5)).toBe(true);
  });
});
