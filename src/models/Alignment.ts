import { logger } from '../config/logger';
import defaultRegistry, { type CodecRegistryService } from '../services/codec-registry.service';
import { readAlignmentFile, writeAlignmentFile } from '../services/alignment-file.service';
import { JsonCodec } from '../services/codecs/json.codec';
import type { AlignmentDocument, JsonLayout } from '../types/alignment-document';
import type { BoundsOptions, FrameBounds, PhonemeData, WordData } from '../types/alignment.types';
import {
  EmptyAlignmentError,
  IndexRangeError,
  LookupError,
  ValidationError,
} from '../utils/errors';
import { frameTimes, intervalsToFrameBounds } from '../utils/frame-timing';
import { fillGaps } from '../utils/gap-filling';
import { findIntervalIndex } from '../utils/interval-search';
import { Phoneme } from './Phoneme';
import { Word } from './Word';

/** Where an alignment comes from. Resolved once, at construction. */
export type AlignmentSource =
  | { kind: 'words'; words: readonly Word[] }
  | { kind: 'file'; path: string }
  | { kind: 'document'; document: AlignmentDocument };

export interface AlignmentOptions {
  /** Fill gaps with silence instead of rejecting them */
  fillGaps?: boolean;
  /** Codecs used for files (default: JSON, MLF and TextGrid) */
  registry?: CodecRegistryService;
}

export interface UpdateOptions {
  /** Global index of the first phoneme to rewrite (default 0) */
  idx?: number;
  /** New durations for phonemes idx, idx + 1, ... */
  durations?: readonly number[];
  /** New start time of phoneme idx */
  start?: number;
}

export type PhonemeMap = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

const documentCodec = new JsonCodec();

/**
 * Word and phoneme timing of one utterance.
 *
 * Words are contiguous: each starts where the previous one ends, and the same
 * holds for the phonemes inside a word. `update` is the only mutation; slicing,
 * concatenation and replacement return new alignments that share nothing with
 * their source.
 */
export class Alignment implements Iterable<Word> {
  private readonly wordList: Word[];
  private readonly phonemeList: Phoneme[];
  private readonly registry: CodecRegistryService;

  constructor(source: AlignmentSource, options: AlignmentOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;

    let data = resolveSource(source, this.registry);
    if (source.kind !== 'words' && data.length === 0) {
      throw new ValidationError(`Alignment ${describeSource(source)} contains no words`);
    }
    if (options.fillGaps) {
      data = fillGaps(data);
    }

    this.wordList = data.map((word) => Word.fromData(word));
    assertContiguous(this.wordList);
    this.phonemeList = this.wordList.flatMap((word) => [...word.phonemes]);
  }

  static fromWords(words: readonly Word[], options?: AlignmentOptions): Alignment {
    return new Alignment({ kind: 'words', words }, options);
  }

  static fromFile(path: string, options?: AlignmentOptions): Alignment {
    return new Alignment({ kind: 'file', path }, options);
  }

  static fromDocument(document: AlignmentDocument, options?: AlignmentOptions): Alignment {
    return new Alignment({ kind: 'document', document }, options);
  }

  get length(): number {
    return this.wordList.length;
  }

  words(): Word[] {
    return [...this.wordList];
  }

  phonemes(): Phoneme[] {
    return [...this.phonemeList];
  }

  *iterPhonemes(): Generator<Phoneme> {
    yield* this.phonemeList;
  }

  [Symbol.iterator](): Iterator<Word> {
    return this.wordList[Symbol.iterator]();
  }

  start(): number {
    if (this.wordList.length === 0) throw new EmptyAlignmentError('the start');
    return this.wordList[0].start();
  }

  end(): number {
    if (this.wordList.length === 0) throw new EmptyAlignmentError('the end');
    return this.wordList[this.wordList.length - 1].end();
  }

  duration(): number {
    return this.end() - this.start();
  }

  wordAt(index: number): Word {
    if (!Number.isInteger(index) || index < 0 || index >= this.wordList.length) {
      throw new IndexRangeError(
        `Word index ${index} is out of range for an alignment of ${this.wordList.length} words`
      );
    }
    return this.wordList[index];
  }

  /**
   * Words `[start, end)` as a new alignment. Bounds must satisfy
   * `0 <= start <= end <= length`. Times are kept as they are, not moved to zero.
   */
  slice(start = 0, end = this.wordList.length): Alignment {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      start > end ||
      end > this.wordList.length
    ) {
      throw new IndexRangeError(
        `Cannot slice words ${start}..${end} of an alignment of ${this.wordList.length} words`
      );
    }
    return new Alignment({ kind: 'words', words: this.wordList.slice(start, end) }, { registry: this.registry });
  }

  /** This alignment followed by `other`, shifted to start where this one ends. */
  concat(other: Alignment): Alignment {
    if (other.length === 0) return this.clone();
    if (this.length === 0) return other.clone();

    const shifted = other.clone();
    shifted.update({ start: this.end() });
    return new Alignment(
      { kind: 'words', words: [...this.wordList, ...shifted.wordList] },
      { registry: this.registry }
    );
  }

  /**
   * Replace words `[startIdx, endIdx)` with copies of `words`, returning a new
   * alignment. Everything from the first replacement word on is re-timed so
   * the result keeps this alignment's start and stays contiguous.
   */
  replaceWords(startIdx: number, endIdx: number, words: readonly Word[]): Alignment {
    if (
      !Number.isInteger(startIdx) ||
      !Number.isInteger(endIdx) ||
      startIdx < 0 ||
      startIdx > endIdx ||
      endIdx > this.wordList.length
    ) {
      throw new IndexRangeError(
        `Cannot replace words ${startIdx}..${endIdx} of an alignment of ${this.wordList.length} words`
      );
    }

    const combined = [
      ...this.wordList.slice(0, startIdx),
      ...words,
      ...this.wordList.slice(endIdx),
    ];

    if (combined.length > 0 && this.wordList.length > 0) {
      const firstPhoneme = this.wordList
        .slice(0, startIdx)
        .reduce((count, word) => count + word.length, 0);
      const start = startIdx > 0 ? this.wordList[startIdx - 1].end() : this.start();
      const phonemes = combined.flatMap((word) => word.toData().phonemes);
      if (firstPhoneme < phonemes.length) {
        chainPhonemes(phonemes, firstPhoneme, start, []);
        return new Alignment({ kind: 'words', words: regroup(combined, phonemes) }, { registry: this.registry });
      }
    }

    return new Alignment({ kind: 'words', words: combined }, { registry: this.registry });
  }

  clone(): Alignment {
    return new Alignment({ kind: 'words', words: this.wordList }, { registry: this.registry });
  }

  equals(other: Alignment): boolean {
    return (
      this.wordList.length === other.wordList.length &&
      this.wordList.every((word, i) => word.equals(other.wordList[i]))
    );
  }

  /** Spoken words separated by spaces; silences are left out. */
  toText(): string {
    return this.wordList
      .filter((word) => !word.isSilence())
      .map((word) => word.label)
      .join(' ');
  }

  toString(): string {
    return this.toText();
  }

  /**
   * Index of the first word of `text` (split on whitespace), matched
   * case-sensitively against consecutive spoken words; silences between them
   * are skipped. Returns -1 when there is no match.
   */
  find(text: string): number {
    const tokens = text.split(/\s+/).filter((token) => token.length > 0);
    if (tokens.length === 0) return -1;

    const spoken: number[] = [];
    this.wordList.forEach((word, i) => {
      if (!word.isSilence()) spoken.push(i);
    });

    for (let s = 0; s + tokens.length <= spoken.length; s++) {
      if (tokens.every((token, k) => this.wordList[spoken[s + k]].label === token)) {
        return spoken[s];
      }
    }
    return -1;
  }

  wordAtTime(time: number): Word | null {
    const index = findIntervalIndex(this.wordList, time);
    return index === -1 ? null : this.wordList[index];
  }

  phonemeAtTime(time: number): Phoneme | null {
    const index = this.phonemeIndexAtTime(time);
    return index === -1 ? null : this.phonemeList[index];
  }

  /** Global index of the phoneme at `time`, or -1. */
  phonemeIndexAtTime(time: number): number {
    return findIntervalIndex(this.phonemeList, time);
  }

  wordBounds(sampleRate: number, hopsize = 1, options: BoundsOptions = {}): FrameBounds[] {
    const bounds = intervalsToFrameBounds(this.wordList, sampleRate, hopsize);
    if (options.silences ?? true) return bounds;
    return bounds.filter((_, i) => !this.wordList[i].isSilence());
  }

  phonemeBounds(sampleRate: number, hopsize = 1, options: BoundsOptions = {}): FrameBounds[] {
    const bounds = intervalsToFrameBounds(this.phonemeList, sampleRate, hopsize);
    if (options.silences ?? true) return bounds;
    return bounds.filter((_, i) => !this.phonemeList[i].isSilence());
  }

  /**
   * Index in `phonemeMap` of the phoneme active at each frame. Frames are
   * `hopsize` seconds apart from the start of the alignment, or the given
   * `times`.
   */
  framewisePhonemeIndices(phonemeMap: PhonemeMap, hopsize: number, times?: readonly number[]): number[] {
    const frames = times ?? frameTimes(this.start(), this.duration(), hopsize);

    return frames.map((time) => {
      const phoneme = this.phonemeAtTime(time);
      if (!phoneme) {
        throw new IndexRangeError(
          `Time ${time} is outside the alignment (${this.wordList.length > 0 ? `${this.start()}-${this.end()}` : 'empty'})`
        );
      }
      const index = lookupPhoneme(phonemeMap, phoneme.label);
      if (index === undefined) throw new LookupError(phoneme.label);
      return index;
    });
  }

  /**
   * Rewrite phoneme boundaries from global phoneme `idx` on. Phoneme `idx`
   * starts at `start` (default: where it starts now); the first
   * `durations.length` phonemes take the given durations and the rest keep
   * theirs, each starting where the previous one ends. Phonemes before `idx`
   * keep their durations and move to end where phoneme `idx` now starts.
   *
   * Words and phonemes obtained before the call keep their old times.
   */
  update(options: UpdateOptions = {}): void {
    const idx = options.idx ?? 0;
    const durations = options.durations ?? [];

    if (!Number.isInteger(idx) || idx < 0 || idx >= this.phonemeList.length) {
      throw new IndexRangeError(
        `Phoneme index ${idx} is out of range for an alignment of ${this.phonemeList.length} phonemes`
      );
    }
    if (idx + durations.length > this.phonemeList.length) {
      throw new IndexRangeError(
        `${durations.length} durations from phoneme ${idx} run past the last of ${this.phonemeList.length} phonemes`
      );
    }
    durations.forEach((duration, k) => {
      if (!Number.isFinite(duration) || duration < 0) {
        throw new ValidationError(`Duration ${k} must be a non-negative number, got ${duration}`);
      }
    });

    const start = options.start ?? this.phonemeList[idx].start();
    if (!Number.isFinite(start)) {
      throw new ValidationError(`Start time must be a number, got ${start}`);
    }

    const phonemes = this.phonemeList.map((phoneme) => phoneme.toData());
    if (start !== phonemes[idx].start) {
      let cursor = start;
      for (let k = idx - 1; k >= 0; k--) {
        const duration = phonemes[k].end - phonemes[k].start;
        phonemes[k] = { label: phonemes[k].label, start: cursor - duration, end: cursor };
        cursor = phonemes[k].start;
      }
    }
    chainPhonemes(phonemes, idx, start, durations);

    const words = regroup(this.wordList, phonemes);
    this.wordList.splice(0, this.wordList.length, ...words);
    this.phonemeList.splice(0, this.phonemeList.length, ...words.flatMap((word) => [...word.phonemes]));
  }

  /** Write the alignment with the codec registered for the path's extension. */
  save(filePath: string): void {
    if (this.wordList.length === 0) {
      // Unsupported extensions are reported first
      this.registry.forPath(filePath);
      throw new EmptyAlignmentError('a file');
    }
    writeAlignmentFile(filePath, this.toData(), this.registry);
    logger.debug('Saved alignment', { path: filePath, words: this.wordList.length });
  }

  toData(): WordData[] {
    return this.wordList.map((word) => word.toData());
  }

  toDocument(layout: JsonLayout = 'words'): AlignmentDocument {
    return documentCodec.toDocument(this.toData(), layout);
  }
}

function resolveSource(source: AlignmentSource, registry: CodecRegistryService): WordData[] {
  switch (source.kind) {
    case 'words':
      return source.words.map((word) => word.toData());
    case 'file':
      return readAlignmentFile(source.path, registry);
    case 'document':
      return documentCodec.fromDocument(source.document, { source: 'document' });
  }
}

function describeSource(source: AlignmentSource): string {
  return source.kind === 'file' ? `file ${source.path}` : source.kind;
}

function assertContiguous(words: readonly Word[]): void {
  for (let i = 0; i < words.length - 1; i++) {
    if (words[i].end() !== words[i + 1].start()) {
      throw new ValidationError(
        `Word ${i} "${words[i].label}" ends at ${words[i].end()} ` +
        `but word ${i + 1} "${words[i + 1].label}" starts at ${words[i + 1].start()}`
      );
    }
  }
}

/** Chain phonemes from `from` on, starting at `start`, with new or current durations. */
function chainPhonemes(
  phonemes: PhonemeData[],
  from: number,
  start: number,
  durations: readonly number[]
): void {
  let cursor = start;
  for (let k = from; k < phonemes.length; k++) {
    const duration = k - from < durations.length ? durations[k - from] : phonemes[k].end - phonemes[k].start;
    phonemes[k] = { label: phonemes[k].label, start: cursor, end: cursor + duration };
    cursor = phonemes[k].end;
  }
}

/** Words with the labels and phoneme counts of `words` over new phoneme times. */
function regroup(words: readonly Word[], phonemes: readonly PhonemeData[]): Word[] {
  let offset = 0;
  return words.map((word) => {
    const data = phonemes.slice(offset, offset + word.length);
    offset += word.length;
    return Word.fromData({ label: word.label, phonemes: data });
  });
}

function lookupPhoneme(phonemeMap: PhonemeMap, label: string): number | undefined {
  if (isReadonlyMap(phonemeMap)) return phonemeMap.get(label);
  return Object.prototype.hasOwnProperty.call(phonemeMap, label) ? phonemeMap[label] : undefined;
}

function isReadonlyMap(phonemeMap: PhonemeMap): phonemeMap is ReadonlyMap<string, number> {
  return phonemeMap instanceof Map;
}
