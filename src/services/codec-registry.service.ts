import path from 'path';
import { logger } from '../config/logger';
import { getConfig } from '../config';
import { UnsupportedFormatError } from '../utils/errors';
import type { AlignmentCodec } from './codecs/codec.interface';
import { JsonCodec } from './codecs/json.codec';
import { MlfCodec } from './codecs/mlf.codec';
import { TextGridCodec } from './codecs/textgrid.codec';

// ===========================================================================
// Codec Registry
//
// Maps file extensions to alignment codecs. Alignment load/save go through
// here, so a new format is one register() call:
//
//   codecRegistry.register(new MyFormatCodec());
//   Alignment.fromFile('utterance.myformat');
// ===========================================================================

export class CodecRegistryService {
  private codecs: Map<string, AlignmentCodec> = new Map();

  /**
   * Register a codec for each of its extensions, replacing any codec
   * previously registered for them.
   */
  register(codec: AlignmentCodec): this {
    for (const extension of codec.extensions) {
      this.codecs.set(extension.toLowerCase(), codec);
    }
    logger.debug(`Registered ${codec.format} codec for ${codec.extensions.join(', ')}`);
    return this;
  }

  /**
   * Codec for a file path, by extension (case-insensitive).
   * Throws UnsupportedFormatError before any I/O happens.
   */
  forPath(filePath: string): AlignmentCodec {
    const extension = path.extname(filePath).toLowerCase();
    const codec = this.codecs.get(extension);
    if (!codec) {
      throw new UnsupportedFormatError(extension, this.extensions());
    }
    return codec;
  }

  /** Codec by format name ("json", "mlf", "textgrid"). */
  forFormat(format: string): AlignmentCodec | null {
    for (const codec of this.codecs.values()) {
      if (codec.format === format) return codec;
    }
    return null;
  }

  extensions(): string[] {
    return Array.from(this.codecs.keys());
  }
}

/** Registry with the built-in JSON, MLF and TextGrid codecs. */
export function createDefaultRegistry(): CodecRegistryService {
  const config = getConfig();
  return new CodecRegistryService()
    .register(new JsonCodec())
    .register(new MlfCodec())
    .register(new TextGridCodec({ boundaryTolerance: config.textGridBoundaryTolerance }));
}

export default createDefaultRegistry();
