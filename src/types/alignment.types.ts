/**
 * Plain alignment data exchanged between codecs and models.
 * Codecs never see model classes, only these shapes.
 */

export interface PhonemeData {
  label: string;
  start: number;
  end: number;
}

export interface WordData {
  label: string;
  phonemes: PhonemeData[];
}

/** Anything with a start and end time in seconds. */
export interface TimeInterval {
  start(): number;
  end(): number;
}

/** Half-open `[startFrame, endFrame)` frame index pair. */
export type FrameBounds = [number, number];

export interface BoundsOptions {
  /** Include silence intervals (default true) */
  silences?: boolean;
}
