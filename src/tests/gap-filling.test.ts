import { describe, it, expect } from 'vitest';
import { Alignment } from '../models/Alignment';
import type { WordListDocument } from '../types/alignment-document';
import type { WordData } from '../types/alignment.types';
import { ValidationError } from '../utils/errors';
import { fillGaps } from '../utils/gap-filling';

const w = (label: string, ...phonemes: [string, number, number][]): WordData => ({
  label,
  phonemes: phonemes.map(([phoneme, start, end]) => ({ label: phoneme, start, end })),
});

describe('fillGaps', () => {
  it('inserts a silence word into a long gap between words', () => {
    expect(fillGaps([w('A', ['AH0', 0, 0.1]), w('B', ['B', 0.2, 0.3])])).toEqual([
      w('A', ['AH0', 0, 0.1]),
      w('sp', ['sp', 0.1, 0.2]),
      w('B', ['B', 0.2, 0.3]),
    ]);
  });

  it('stretches a neighbouring silence instead of adding one', () => {
    expect(fillGaps([w('sp', ['sp', 0, 0.1]), w('B', ['B', 0.2, 0.3])])).toEqual([
      w('sp', ['sp', 0, 0.2]),
      w('B', ['B', 0.2, 0.3]),
    ]);
  });

  it('closes a short gap by moving the later start back', () => {
    expect(fillGaps([w('A', ['AH0', 0, 0.1]), w('B', ['B', 0.1005, 0.3])])).toEqual([
      w('A', ['AH0', 0, 0.1]),
      w('B', ['B', 0.1, 0.3]),
    ]);
  });

  it('fills gaps between the phonemes of a word', () => {
    expect(fillGaps([w('AB', ['AH0', 0, 0.1], ['B', 0.2, 0.3])])).toEqual([
      w('AB', ['AH0', 0, 0.1], ['sp', 0.1, 0.2], ['B', 0.2, 0.3]),
    ]);
    expect(fillGaps([w('AB', ['AH0', 0, 0.1], ['B', 0.10005, 0.3])])).toEqual([
      w('AB', ['AH0', 0, 0.1], ['B', 0.1, 0.3]),
    ]);
  });

  it('leaves its input unchanged', () => {
    const input = [w('A', ['AH0', 0, 0.1]), w('B', ['B', 0.1005, 0.3])];

    fillGaps(input);

    expect(input[1].phonemes[0].start).toBe(0.1005);
  });
});

describe('Alignment with fillGaps', () => {
  const document: WordListDocument = {
    words: [
      { alignedWord: 'A', phonemes: [['AH0', 0, 0.1]] },
      { alignedWord: 'B', phonemes: [['B', 0.2, 0.3]] },
    ],
  };

  it('accepts a gapped document when asked to fill gaps', () => {
    const alignment = Alignment.fromDocument(document, { fillGaps: true });

    expect(alignment.length).toBe(3);
    expect(alignment.wordAt(1).isSilence()).toBe(true);
    expect(alignment.toText()).toBe('A B');
  });

  it('rejects the same document otherwise', () => {
    expect(() => Alignment.fromDocument(document)).toThrow(ValidationError);
    expect(() => Alignment.fromDocument(document)).toThrow('Word 0 "A" ends at 0.1 but word 1 "B" starts at 0.2');
  });
});
