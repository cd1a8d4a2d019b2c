import type { PhonemeData, WordData } from '../types/alignment.types';
import { isSilenceMark, SILENCE } from './silence';

/** Gaps between words longer than this become silence words. */
export const WORD_GAP_THRESHOLD = 1e-3;

/** Gaps between phonemes of a word longer than this become silence phonemes. */
export const PHONEME_GAP_THRESHOLD = 1e-4;

/**
 * Close the gaps of an alignment that is not contiguous. Long gaps are filled
 * with silence (stretching a neighbouring silence word where there is one);
 * shorter ones are closed by moving the later start back. Overlaps are left
 * for validation to reject. Returns new data; the input is not modified.
 */
export function fillGaps(words: readonly WordData[]): WordData[] {
  const filled: WordData[] = [];

  for (const source of words) {
    const word: WordData = { label: source.label, phonemes: fillPhonemeGaps(source.phonemes) };
    const previous = filled[filled.length - 1];

    if (previous && word.phonemes.length > 0 && previous.phonemes.length > 0) {
      const lastPhoneme = previous.phonemes[previous.phonemes.length - 1];
      const firstPhoneme = word.phonemes[0];
      const gap = firstPhoneme.start - lastPhoneme.end;

      if (gap > WORD_GAP_THRESHOLD) {
        if (isSilenceMark(word.label)) {
          firstPhoneme.start = lastPhoneme.end;
        } else if (isSilenceMark(previous.label)) {
          lastPhoneme.end = firstPhoneme.start;
        } else {
          filled.push({
            label: SILENCE,
            phonemes: [{ label: SILENCE, start: lastPhoneme.end, end: firstPhoneme.start }],
          });
        }
      } else if (gap > 0) {
        firstPhoneme.start = lastPhoneme.end;
      }
    }

    filled.push(word);
  }

  return filled;
}

function fillPhonemeGaps(phonemes: readonly PhonemeData[]): PhonemeData[] {
  const filled: PhonemeData[] = [];

  for (const source of phonemes) {
    const phoneme = { ...source };
    const previous = filled[filled.length - 1];

    if (previous) {
      const gap = phoneme.start - previous.end;
      if (gap > PHONEME_GAP_THRESHOLD) {
        filled.push({ label: SILENCE, start: previous.end, end: phoneme.start });
      } else if (gap > 0) {
        phoneme.start = previous.end;
      }
    }

    filled.push(phoneme);
  }

  return filled;
}
