import { logger } from '../../config/logger';
import type { PhonemeData, WordData } from '../../types/alignment.types';
import { FormatError, ValidationError } from '../../utils/errors';
import { normalizeMark, SILENCE, SILENCE_MARK } from '../../utils/silence';
import type { AlignmentCodec, CodecContext, SerializeContext } from './codec.interface';

// ===========================================================================
// Praat TextGrid (text form)
//
// Both the long form (`xmin = 0.15`, `intervals [2]:`) and the short form
// (one bare value per line) are the same sequence of values once keys,
// bracketed indices and `!` comments are skipped, so reading is a token
// stream: numbers, quoted strings ("" escapes a quote) and <flags>.
//
// The word tier and the phoneme tier are found by name. Each word collects
// the phoneme intervals that end inside it; the collected span has to match
// the word interval within `boundaryTolerance` seconds. A zero-length
// phoneme on a word boundary goes to the earlier word, unless a zero-length
// word sits at the same point. Zero-length silence on the edge of a spoken
// word, and zero-length intervals outside every word, are dropped.
// ===========================================================================

export const WORD_TIER = 'words';
export const PHONEME_TIER = 'phones';

export interface TextGridCodecOptions {
  /** Seconds a word boundary may differ from its phonemes' boundary (default 0) */
  boundaryTolerance?: number;
}

type Token =
  | { kind: 'number'; value: number; line: number }
  | { kind: 'string'; value: string; line: number }
  | { kind: 'flag'; value: string; line: number };

interface TierInterval {
  start: number;
  end: number;
  label: string;
}

interface Tier {
  name: string;
  intervals: TierInterval[];
}

const NUMBER = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER = /[A-Za-z_][\w?]*/y;

export class TextGridCodec implements AlignmentCodec {
  readonly format = 'textgrid';
  readonly extensions = ['.textgrid'] as const;

  private readonly boundaryTolerance: number;

  constructor(options: TextGridCodecOptions = {}) {
    this.boundaryTolerance = options.boundaryTolerance ?? 0;
  }

  parse(content: string, context: CodecContext = {}): WordData[] {
    const tiers = readTiers(new TokenReader(tokenize(content, context.source), context.source));

    const wordTier = tiers.find((tier) => /word/i.test(tier.name));
    const phonemeTier = tiers.find((tier) => tier !== wordTier && /phon/i.test(tier.name));
    if (!wordTier || !phonemeTier) {
      logger.warn('TextGrid tiers not recognised', { source: context.source, tiers: tiers.map((t) => t.name) });
      throw new FormatError(
        `Cannot determine which TextGrid tiers hold words and phonemes (tiers: ${tiers.map((t) => `"${t.name}"`).join(', ')})`,
        context.source
      );
    }

    const words = this.reconcile(wordTier.intervals, phonemeTier.intervals);
    logger.debug('Parsed TextGrid alignment', {
      source: context.source,
      words: words.length,
      phonemes: phonemeTier.intervals.length,
    });
    return words;
  }

  serialize(words: readonly WordData[], _context: SerializeContext = {}): string {
    const phonemes = words.flatMap((word) => word.phonemes);
    const xmin = phonemes.length > 0 ? phonemes[0].start : 0;
    const xmax = phonemes.length > 0 ? phonemes[phonemes.length - 1].end : 0;

    const wordIntervals = words.map((word) => ({
      start: word.phonemes[0].start,
      end: word.phonemes[word.phonemes.length - 1].end,
      label: word.label,
    }));

    return [
      'File type = "ooTextFile"',
      'Object class = "TextGrid"',
      '',
      `xmin = ${xmin}`,
      `xmax = ${xmax}`,
      'tiers? <exists>',
      'size = 2',
      'item []:',
      ...renderTier(1, WORD_TIER, xmin, xmax, wordIntervals),
      ...renderTier(2, PHONEME_TIER, xmin, xmax, phonemes),
      '',
    ].join('\n');
  }

  private reconcile(wordIntervals: TierInterval[], phonemeIntervals: TierInterval[]): WordData[] {
    const tolerance = this.boundaryTolerance;
    const words: WordData[] = [];
    let next = 0;

    wordIntervals.forEach((word, w) => {
      const label = normalizeMark(word.label);
      const following = wordIntervals[w + 1];
      const phonemes: PhonemeData[] = [];

      while (next < phonemeIntervals.length && phonemeIntervals[next].end <= word.end + tolerance) {
        const phoneme = phonemeIntervals[next];
        // A point shared with a zero-length word that follows belongs to that word
        if (following && isPoint(phoneme) && isPoint(following) && phoneme.start === following.start) break;
        next++;

        const mark = normalizeMark(phoneme.label);
        // Aligners put zero-length pauses between spoken words
        if (isPoint(phoneme) && mark === SILENCE && label !== SILENCE && !isInside(phoneme, word, tolerance)) continue;
        phonemes.push({ label: mark, start: phoneme.start, end: phoneme.end });
      }

      if (phonemes.length === 0) {
        if (isPoint(word)) return;
        if (label !== SILENCE) {
          throw new ValidationError(`Word "${label}" (${word.start}-${word.end}) contains no phonemes`);
        }
        words.push({ label, phonemes: [{ label: SILENCE, start: word.start, end: word.end }] });
        return;
      }

      const first = phonemes[0].start;
      const last = phonemes[phonemes.length - 1].end;
      if (Math.abs(first - word.start) > tolerance || Math.abs(last - word.end) > tolerance) {
        throw new ValidationError(
          `Word "${label}" spans ${word.start}-${word.end} but its phonemes span ${first}-${last}`
        );
      }

      words.push({ label, phonemes });
    });

    const leftover = phonemeIntervals.slice(next).filter((phoneme) => !isPoint(phoneme));
    if (leftover.length > 0) {
      throw new ValidationError(
        `${leftover.length} phoneme interval(s) from ${leftover[0].start}s lie after the last word`
      );
    }

    return words;
  }
}

function isPoint(interval: TierInterval): boolean {
  return interval.end === interval.start;
}

/** Strictly between the word's edges */
function isInside(phoneme: TierInterval, word: TierInterval, tolerance: number): boolean {
  return phoneme.start > word.start + tolerance && phoneme.end < word.end - tolerance;
}

function tokenize(content: string, source?: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;

  while (i < content.length) {
    const ch = content[i];

    if (ch === '\n') {
      line++;
      i++;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === '!') {
      while (i < content.length && content[i] !== '\n') i++;
    } else if (ch === '"') {
      const startLine = line;
      let value = '';
      let j = i + 1;
      for (;;) {
        if (j >= content.length) {
          throw new FormatError('Unterminated string', source, startLine);
        }
        if (content[j] === '"') {
          if (content[j + 1] !== '"') break;
          value += '"';
          j += 2;
          continue;
        }
        if (content[j] === '\n') line++;
        value += content[j];
        j++;
      }
      tokens.push({ kind: 'string', value, line: startLine });
      i = j + 1;
    } else if (ch === '<') {
      const close = content.indexOf('>', i);
      if (close === -1) throw new FormatError('Unterminated <flag>', source, line);
      tokens.push({ kind: 'flag', value: content.slice(i + 1, close), line });
      i = close + 1;
    } else if (ch === '[') {
      const close = content.indexOf(']', i);
      if (close === -1) throw new FormatError('Unterminated [index]', source, line);
      i = close + 1;
    } else if (matchAt(IDENTIFIER, content, i)) {
      i += matchAt(IDENTIFIER, content, i).length;
    } else if (matchAt(NUMBER, content, i)) {
      const text = matchAt(NUMBER, content, i);
      tokens.push({ kind: 'number', value: Number(text), line });
      i += text.length;
    } else {
      // '=', ':', '?' and the byte-order mark separate values
      i++;
    }
  }

  return tokens;
}

function matchAt(pattern: RegExp, content: string, index: number): string {
  pattern.lastIndex = index;
  return pattern.exec(content)?.[0] ?? '';
}

class TokenReader {
  private position = 0;

  constructor(private readonly tokens: Token[], private readonly source?: string) {}

  number(what: string): number {
    const token = this.take('number', what);
    return token.value;
  }

  count(what: string): number {
    const token = this.take('number', what);
    if (!Number.isInteger(token.value) || token.value < 0) {
      throw this.error(`Expected a count for ${what}, found ${token.value}`, token.line);
    }
    return token.value;
  }

  string(what: string): string {
    return this.take('string', what).value;
  }

  flag(what: string): string {
    return this.take('flag', what).value;
  }

  error(message: string, line = this.line()): FormatError {
    return new FormatError(message, this.source, line);
  }

  line(): number | undefined {
    return (this.tokens[this.position] ?? this.tokens[this.tokens.length - 1])?.line;
  }

  private take<K extends Token['kind']>(kind: K, what: string): Extract<Token, { kind: K }> {
    const token = this.tokens[this.position];
    if (!token) {
      throw this.error(`Unexpected end of TextGrid while reading ${what}`);
    }
    if (!isKind(token, kind)) {
      throw this.error(`Expected ${kind} for ${what}, found ${token.kind} "${token.value}"`, token.line);
    }
    this.position++;
    return token;
  }
}

function isKind<K extends Token['kind']>(token: Token, kind: K): token is Extract<Token, { kind: K }> {
  return token.kind === kind;
}

function readTiers(reader: TokenReader): Tier[] {
  const fileType = reader.string('file type');
  if (!fileType.startsWith('ooTextFile')) {
    throw reader.error(`Unsupported file type "${fileType}"`, 1);
  }
  const objectClass = reader.string('object class');
  if (objectClass !== 'TextGrid') {
    throw reader.error(`Expected a TextGrid, found "${objectClass}"`);
  }

  reader.number('xmin');
  reader.number('xmax');
  if (reader.flag('tiers flag') !== 'exists') return [];

  const tiers: Tier[] = [];
  const size = reader.count('tier count');
  for (let t = 1; t <= size; t++) {
    const tierClass = reader.string(`class of tier ${t}`);
    const name = reader.string(`name of tier ${t}`);
    reader.number(`xmin of tier "${name}"`);
    reader.number(`xmax of tier "${name}"`);
    const count = reader.count(`size of tier "${name}"`);

    if (tierClass === 'IntervalTier') {
      tiers.push({ name, intervals: readIntervals(reader, name, count) });
    } else if (tierClass === 'TextTier') {
      for (let p = 1; p <= count; p++) {
        reader.number(`time of point ${p} in "${name}"`);
        reader.string(`mark of point ${p} in "${name}"`);
      }
    } else {
      throw reader.error(`Unknown tier class "${tierClass}"`);
    }
  }

  return tiers;
}

function readIntervals(reader: TokenReader, tier: string, count: number): TierInterval[] {
  const intervals: TierInterval[] = [];
  for (let n = 1; n <= count; n++) {
    const line = reader.line();
    const start = reader.number(`xmin of interval ${n} in "${tier}"`);
    const end = reader.number(`xmax of interval ${n} in "${tier}"`);
    const label = reader.string(`text of interval ${n} in "${tier}"`);

    if (end < start) {
      throw reader.error(`Interval ${n} in "${tier}" ends at ${end}, before its start ${start}`, line);
    }
    intervals.push({ start, end, label });
  }
  return intervals;
}

function renderTier(
  index: number,
  name: string,
  xmin: number,
  xmax: number,
  intervals: readonly TierInterval[]
): string[] {
  const lines = [
    `    item [${index}]:`,
    '        class = "IntervalTier"',
    `        name = "${name}"`,
    `        xmin = ${xmin}`,
    `        xmax = ${xmax}`,
    `        intervals: size = ${intervals.length}`,
  ];
  intervals.forEach((interval, i) => {
    lines.push(
      `        intervals [${i + 1}]:`,
      `            xmin = ${interval.start}`,
      `            xmax = ${interval.end}`,
      `            text = "${quote(interval.label)}"`
    );
  });
  return lines;
}

function quote(label: string): string {
  const mark = label === SILENCE ? SILENCE_MARK : label;
  return mark.replace(/"/g, '""');
}
