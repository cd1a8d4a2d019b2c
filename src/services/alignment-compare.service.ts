import type { Alignment } from '../models/Alignment';
import { IndexRangeError, ValidationError } from '../utils/errors';
import { linspace } from '../utils/frame-timing';

/**
 * Relative speed of `target` against `source`, phoneme by phoneme:
 * `target[i].duration() / source[i].duration()`.
 */
export function perPhonemeRate(source: Alignment, target: Alignment): number[] {
  const sourcePhonemes = source.phonemes();
  const targetPhonemes = target.phonemes();

  if (sourcePhonemes.length !== targetPhonemes.length) {
    throw new ValidationError(
      `Alignments must have the same number of phonemes (${sourcePhonemes.length} vs ${targetPhonemes.length})`
    );
  }

  return sourcePhonemes.map((phoneme, i) => targetPhonemes[i].duration() / phoneme.duration());
}

/**
 * Per-phoneme rate sampled at `frames` evenly spaced times from 0 to the end
 * of `source`. By default one frame per hop, counting both ends.
 */
export function perFrameRate(
  source: Alignment,
  target: Alignment,
  sampleRate: number,
  hopsize: number,
  frames?: number
): number[] {
  const rates = perPhonemeRate(source, target);
  const end = source.end();
  const count = frames ?? 1 + Math.floor((Math.round(end * 1e6) / 1e6) * sampleRate / hopsize);

  return linspace(0, end, count).map((time) => {
    const index = source.phonemeIndexAtTime(time);
    if (index === -1) {
      throw new IndexRangeError(`No phoneme at ${time}s; the alignment starts at ${source.start()}s`);
    }
    return rates[index];
  });
}
