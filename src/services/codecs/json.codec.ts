import { logger } from '../../config/logger';
import {
  labelMapDocumentSchema,
  wordListDocumentSchema,
  type AlignmentDocument,
  type DocumentWord,
  type JsonLayout,
  type LabelMapDocument,
  type WordListDocument,
} from '../../types/alignment-document';
import type { WordData } from '../../types/alignment.types';
import { FormatError, ValidationError } from '../../utils/errors';
import { SILENCE } from '../../utils/silence';
import type { AlignmentCodec, CodecContext, SerializeContext } from './codec.interface';

export interface JsonCodecOptions {
  /** Document layout written by serialize (default "words") */
  layout?: JsonLayout;
  /** Spaces of indentation (default 4) */
  indent?: number;
}

// Keys an object orders numerically ahead of every other key
const ARRAY_INDEX_KEY = /^(0|[1-9]\d*)$/;

export class JsonCodec implements AlignmentCodec {
  readonly format = 'json';
  readonly extensions = ['.json'] as const;

  private readonly layout: JsonLayout;
  private readonly indent: number;

  constructor(options: JsonCodecOptions = {}) {
    this.layout = options.layout ?? 'words';
    this.indent = options.indent ?? 4;
  }

  parse(content: string, context: CodecContext = {}): WordData[] {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FormatError(`Invalid JSON: ${reason}`, context.source);
    }

    const words = this.fromDocument(raw, context);
    logger.debug('Parsed JSON alignment', { source: context.source, words: words.length });
    return words;
  }

  serialize(words: readonly WordData[], _context: SerializeContext = {}): string {
    return `${JSON.stringify(this.toDocument(words), null, this.indent)}\n`;
  }

  /** Validate an in-memory document and convert it to words. */
  fromDocument(document: unknown, context: CodecContext = {}): WordData[] {
    const list = wordListDocumentSchema.safeParse(document);
    if (list.success) {
      return list.data.words.map((word, i) => wordFromEntry(word, i, context));
    }

    const labels = labelMapDocumentSchema.safeParse(document);
    if (labels.success) {
      const indexKey = Object.keys(labels.data).find((label) => ARRAY_INDEX_KEY.test(label));
      if (indexKey !== undefined) {
        throw new FormatError(
          `Word "${indexKey}" is an integer-like key, which loses its position in a label map; use the "words" layout`,
          context.source
        );
      }
      return Object.entries(labels.data).map(([label, phonemes]) => ({
        label,
        phonemes: phonemes.map(([phoneme, start, end]) => ({ label: phoneme, start, end })),
      }));
    }

    const issue = (looksLikeWordList(document) ? list.error : labels.error).issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    logger.warn('Rejected JSON alignment document', { source: context.source, path: where });
    throw new FormatError(`Invalid alignment document at ${where}: ${issue.message}`, context.source);
  }

  toDocument(words: readonly WordData[], layout: JsonLayout = this.layout): AlignmentDocument {
    return layout === 'labels' ? toLabelMap(words) : toWordList(words);
  }
}

function looksLikeWordList(document: unknown): boolean {
  return (
    typeof document === 'object' &&
    document !== null &&
    'words' in document &&
    Array.isArray(document.words) &&
    document.words.some((word: unknown) => !Array.isArray(word))
  );
}

function wordFromEntry(entry: DocumentWord, index: number, context: CodecContext): WordData {
  const label = entry.alignedWord ?? entry.word;

  if (entry.phonemes && entry.phonemes.length > 0) {
    return {
      label: label ?? SILENCE,
      phonemes: entry.phonemes.map(([phoneme, start, end]) => ({ label: phoneme, start, end })),
    };
  }

  // Entries without phonemes are pauses the aligner did not label
  if (entry.start === undefined || entry.end === undefined) {
    throw new FormatError(`words.${index} has neither phonemes nor start and end times`, context.source);
  }
  return { label: SILENCE, phonemes: [{ label: SILENCE, start: entry.start, end: entry.end }] };
}

function toWordList(words: readonly WordData[]): WordListDocument {
  return {
    words: words.map((word) => ({
      alignedWord: word.label,
      start: word.phonemes[0]?.start,
      end: word.phonemes[word.phonemes.length - 1]?.end,
      phonemes: word.phonemes.map((phoneme) => [phoneme.label, phoneme.start, phoneme.end]),
    })),
  };
}

function toLabelMap(words: readonly WordData[]): LabelMapDocument {
  const document: LabelMapDocument = {};
  for (const word of words) {
    if (Object.prototype.hasOwnProperty.call(document, word.label)) {
      throw new ValidationError(`Word "${word.label}" occurs more than once; use the "words" layout`);
    }
    if (ARRAY_INDEX_KEY.test(word.label)) {
      throw new ValidationError(`Word "${word.label}" would be reordered as an object key; use the "words" layout`);
    }
    document[word.label] = word.phonemes.map((phoneme) => [phoneme.label, phoneme.start, phoneme.end]);
  }
  return document;
}
