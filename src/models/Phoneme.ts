import type { PhonemeData } from '../types/alignment.types';
import { ValidationError } from '../utils/errors';
import { SILENCE } from '../utils/silence';

/**
 * One aligned phoneme: a label and a `[start, end]` span in seconds.
 *
 * Immutable: `Alignment.update` swaps in re-timed copies. Equality is exact
 * on both times, so alignments that went through a lossy format compare unequal.
 */
export class Phoneme {
  private readonly startTime: number;
  private readonly endTime: number;

  constructor(public readonly label: string, start: number, end: number) {
    assertSpan(label, start, end);
    this.startTime = start;
    this.endTime = end;
  }

  static fromData(data: PhonemeData): Phoneme {
    return new Phoneme(data.label, data.start, data.end);
  }

  start(): number {
    return this.startTime;
  }

  end(): number {
    return this.endTime;
  }

  duration(): number {
    return this.endTime - this.startTime;
  }

  isSilence(): boolean {
    return this.label === SILENCE;
  }

  equals(other: Phoneme): boolean {
    return (
      this.label === other.label &&
      this.startTime === other.startTime &&
      this.endTime === other.endTime
    );
  }

  clone(): Phoneme {
    return new Phoneme(this.label, this.startTime, this.endTime);
  }

  toData(): PhonemeData {
    return { label: this.label, start: this.startTime, end: this.endTime };
  }

  toString(): string {
    return this.label;
  }
}

function assertSpan(label: string, start: number, end: number): void {
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new ValidationError(`Phoneme "${label}" has a non-finite time (${start}, ${end})`);
  }
  if (start > end) {
    throw new ValidationError(`Phoneme "${label}" starts after it ends (${start} > ${end})`);
  }
}
