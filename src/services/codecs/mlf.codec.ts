import { logger } from '../../config/logger';
import type { PhonemeData, WordData } from '../../types/alignment.types';
import { FormatError, ValidationError } from '../../utils/errors';
import { normalizeMark, SILENCE, SILENCE_MARK } from '../../utils/silence';
import type { AlignmentCodec, CodecContext, SerializeContext } from './codec.interface';

// ===========================================================================
// HTK master label file
//
//   #!MLF!#
//   "*/utterance.lab"
//   <start> <end> <phone> [<score>] [<word>]
//   .
//
// Times are integer counts of 100 ns. Scores are optional; a fourth field
// that is not a number is the word. A word label opens a new word; lines
// without one continue the current word.
// ===========================================================================

export const TICKS_PER_SECOND = 10_000_000;

const MLF_HEADER = '#!MLF!#';
const TICKS = /^\d+$/;

interface MlfLine {
  start: number;
  end: number;
  phoneme: string;
  word?: string;
}

export class MlfCodec implements AlignmentCodec {
  readonly format = 'mlf';
  readonly extensions = ['.mlf'] as const;

  parse(content: string, context: CodecContext = {}): WordData[] {
    const words: WordData[] = [];
    let current: WordData | null = null;
    let pendingWord: string | null = null;
    let seenLabelFile = false;

    content.split(/\r?\n/).forEach((text, i) => {
      const lineNumber = i + 1;
      const trimmed = text.trim();

      if (trimmed === '' || trimmed === MLF_HEADER || trimmed === '.') return;

      if (trimmed.startsWith('"')) {
        if (seenLabelFile && words.length > 0) {
          throw new FormatError('Only one utterance per MLF file is supported', context.source, lineNumber);
        }
        seenLabelFile = true;
        return;
      }

      const line = parseLine(trimmed, context.source, lineNumber);

      // Aligners emit zero-length short pauses; the word they open still ends the previous one
      if (line.end === line.start && line.phoneme === SILENCE) {
        if (line.word !== undefined) pendingWord = line.word;
        return;
      }

      const opens = line.word ?? pendingWord;
      pendingWord = null;
      const phoneme: PhonemeData = {
        label: line.phoneme,
        start: line.start / TICKS_PER_SECOND,
        end: line.end / TICKS_PER_SECOND,
      };

      if (opens !== null) {
        current = { label: opens, phonemes: [phoneme] };
        words.push(current);
      } else if (current) {
        current.phonemes.push(phoneme);
      } else {
        throw new FormatError(`Phoneme "${line.phoneme}" appears before any word label`, context.source, lineNumber);
      }
    });

    logger.debug('Parsed MLF alignment', { source: context.source, words: words.length });
    return words;
  }

  serialize(words: readonly WordData[], context: SerializeContext = {}): string {
    const lines = [MLF_HEADER, `"*/${context.name ?? 'alignment'}.lab"`];

    for (const word of words) {
      word.phonemes.forEach((phoneme, i) => {
        const fields = [
          toTicks(phoneme.start),
          toTicks(phoneme.end),
          toMark(phoneme.label),
          '0',
        ];
        if (i === 0) fields.push(toMark(word.label));
        lines.push(fields.join(' '));
      });
    }

    lines.push('.');
    return `${lines.join('\n')}\n`;
  }
}

function parseLine(text: string, source: string | undefined, lineNumber: number): MlfLine {
  const fields = text.split(/\s+/);
  if (fields.length < 3 || fields.length > 5) {
    logger.warn('Rejected MLF line', { source, line: lineNumber });
    throw new FormatError(`Expected 3 to 5 fields, found ${fields.length}: "${text}"`, source, lineNumber);
  }

  const [start, end, phoneme, ...rest] = fields;
  if (!TICKS.test(start) || !TICKS.test(end)) {
    throw new FormatError(`Times must be whole 100 ns ticks: "${text}"`, source, lineNumber);
  }

  let word: string | undefined;
  if (rest.length === 2) {
    const [score, label] = rest;
    if (!isNumeric(score)) {
      throw new FormatError(`Score "${score}" is not a number`, source, lineNumber);
    }
    word = label;
  } else if (rest.length === 1 && !isNumeric(rest[0])) {
    word = rest[0];
  }

  const startTicks = Number(start);
  const endTicks = Number(end);
  if (endTicks < startTicks) {
    throw new FormatError(`End ${end} is before start ${start}`, source, lineNumber);
  }

  return {
    start: startTicks,
    end: endTicks,
    phoneme: normalizeMark(phoneme),
    word: word === undefined ? undefined : normalizeMark(word),
  };
}

function isNumeric(field: string): boolean {
  return Number.isFinite(Number(field));
}

function toTicks(seconds: number): string {
  return String(Math.round(seconds * TICKS_PER_SECOND));
}

function toMark(label: string): string {
  if (label === SILENCE) return SILENCE_MARK;
  if (label === '' || /\s/.test(label)) {
    throw new ValidationError(`Label "${label}" cannot be written to an MLF field`);
  }
  return label;
}
