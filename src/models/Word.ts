import type { WordData } from '../types/alignment.types';
import { IndexRangeError, ValidationError } from '../utils/errors';
import { findIntervalIndex } from '../utils/interval-search';
import { SILENCE } from '../utils/silence';
import { Phoneme } from './Phoneme';

/**
 * An aligned word: a label over one or more contiguous phonemes. Start and
 * end are read from the first and last phoneme.
 */
export class Word implements Iterable<Phoneme> {
  private readonly phonemeList: Phoneme[];

  constructor(public readonly label: string, phonemes: readonly Phoneme[]) {
    if (phonemes.length === 0) {
      throw new ValidationError(`Word "${label}" has no phonemes`);
    }
    for (let i = 0; i < phonemes.length - 1; i++) {
      if (phonemes[i].end() !== phonemes[i + 1].start()) {
        throw new ValidationError(
          `Word "${label}": phoneme ${i} "${phonemes[i].label}" ends at ${phonemes[i].end()} ` +
          `but phoneme ${i + 1} "${phonemes[i + 1].label}" starts at ${phonemes[i + 1].start()}`
        );
      }
    }
    this.phonemeList = [...phonemes];
  }

  static fromData(data: WordData): Word {
    return new Word(data.label, data.phonemes.map((phoneme) => Phoneme.fromData(phoneme)));
  }

  /** A silence word made of a single silence phoneme. */
  static silence(start: number, end: number): Word {
    return new Word(SILENCE, [new Phoneme(SILENCE, start, end)]);
  }

  get length(): number {
    return this.phonemeList.length;
  }

  get phonemes(): readonly Phoneme[] {
    return this.phonemeList;
  }

  start(): number {
    return this.phonemeList[0].start();
  }

  end(): number {
    return this.phonemeList[this.phonemeList.length - 1].end();
  }

  duration(): number {
    return this.end() - this.start();
  }

  isSilence(): boolean {
    return this.label === SILENCE;
  }

  phonemeAt(index: number): Phoneme {
    if (!Number.isInteger(index) || index < 0 || index >= this.phonemeList.length) {
      throw new IndexRangeError(
        `Phoneme index ${index} is out of range for word "${this.label}" with ${this.phonemeList.length} phonemes`
      );
    }
    return this.phonemeList[index];
  }

  phonemeAtTime(time: number): Phoneme | null {
    const index = findIntervalIndex(this.phonemeList, time);
    return index === -1 ? null : this.phonemeList[index];
  }

  *iterPhonemes(): Generator<Phoneme> {
    yield* this.phonemeList;
  }

  [Symbol.iterator](): Iterator<Phoneme> {
    return this.iterPhonemes();
  }

  equals(other: Word): boolean {
    return (
      this.label === other.label &&
      this.phonemeList.length === other.phonemeList.length &&
      this.phonemeList.every((phoneme, i) => phoneme.equals(other.phonemeList[i]))
    );
  }

  clone(): Word {
    return new Word(this.label, this.phonemeList.map((phoneme) => phoneme.clone()));
  }

  toData(): WordData {
    return { label: this.label, phonemes: this.phonemeList.map((phoneme) => phoneme.toData()) };
  }

  toString(): string {
    return this.label;
  }
}
