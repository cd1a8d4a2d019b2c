/** Reserved label of non-speech words and phonemes. */
export const SILENCE = 'sp';

/** Label written for silence by the TextGrid and MLF codecs. */
export const SILENCE_MARK = 'sil';

const SILENCE_MARKS = new Set([SILENCE, SILENCE_MARK, '']);

export function isSilenceMark(label: string): boolean {
  return SILENCE_MARKS.has(label.trim());
}

/** Map any silence mark read from a file onto `SILENCE`. */
export function normalizeMark(label: string): string {
  return isSilenceMark(label) ? SILENCE : label;
}
