// ===========================================================================
// Alignment codec abstraction
//
// Each interchange format (JSON, MLF, TextGrid) is a stateless parse/serialize
// pair over plain WordData. Alignment never branches on format: the codec
// registry picks the codec from the file extension.
//
// Adding a format:
//   1. Implement AlignmentCodec in a new file
//   2. Register it with codecRegistry.register()
// ===========================================================================

import type { WordData } from '../../types/alignment.types';

export const ALIGNMENT_FORMATS = ['json', 'mlf', 'textgrid'] as const;
export type AlignmentFormat = (typeof ALIGNMENT_FORMATS)[number] | (string & {});

export interface CodecContext {
  /** File name or other label used in error messages */
  source?: string;
}

export interface SerializeContext extends CodecContext {
  /** Utterance name, for formats that record one (MLF label file name) */
  name?: string;
}

/**
 * Interface that every alignment format must implement.
 */
export interface AlignmentCodec {
  /** Format identifier */
  readonly format: AlignmentFormat;

  /** File extensions handled, with leading dot, lower case */
  readonly extensions: readonly string[];

  /** Parse file content into words. Throws FormatError or ValidationError. */
  parse(content: string, context?: CodecContext): WordData[];

  /** Render words as file content */
  serialize(words: readonly WordData[], context?: SerializeContext): string;
}
