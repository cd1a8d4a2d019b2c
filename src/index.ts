export { Phoneme } from './models/Phoneme';
export { Word } from './models/Word';
export {
  Alignment,
  type AlignmentOptions,
  type AlignmentSource,
  type PhonemeMap,
  type UpdateOptions,
} from './models/Alignment';

export type { BoundsOptions, FrameBounds, PhonemeData, TimeInterval, WordData } from './types/alignment.types';
export {
  JSON_LAYOUTS,
  labelMapDocumentSchema,
  wordListDocumentSchema,
  type AlignmentDocument,
  type JsonLayout,
  type LabelMapDocument,
  type WordListDocument,
} from './types/alignment-document';

export {
  ALIGNMENT_FORMATS,
  type AlignmentCodec,
  type AlignmentFormat,
  type CodecContext,
  type SerializeContext,
} from './services/codecs/codec.interface';
export { JsonCodec, type JsonCodecOptions } from './services/codecs/json.codec';
export { MlfCodec, TICKS_PER_SECOND } from './services/codecs/mlf.codec';
export { TextGridCodec, PHONEME_TIER, WORD_TIER, type TextGridCodecOptions } from './services/codecs/textgrid.codec';
export { default as codecRegistry, CodecRegistryService, createDefaultRegistry } from './services/codec-registry.service';
export { readAlignmentFile, writeAlignmentFile } from './services/alignment-file.service';
export { perFrameRate, perPhonemeRate } from './services/alignment-compare.service';

export { FRAME_ROUNDING, frameTimes, intervalsToFrameBounds, secondsToFrameIndex } from './utils/frame-timing';
export { fillGaps, PHONEME_GAP_THRESHOLD, WORD_GAP_THRESHOLD } from './utils/gap-filling';
export { isSilenceMark, SILENCE, SILENCE_MARK } from './utils/silence';
export {
  AlignmentError,
  EmptyAlignmentError,
  FormatError,
  IndexRangeError,
  LookupError,
  UnsupportedFormatError,
  ValidationError,
  type AlignmentErrorCode,
} from './utils/errors';

export { getConfig, parseConfig, resetConfig, type AppConfig } from './config';
export { logger } from './config/logger';
