import fs from 'fs';
import path from 'path';
import { logger } from '../config/logger';
import type { WordData } from '../types/alignment.types';
import defaultRegistry, { type CodecRegistryService } from './codec-registry.service';

/**
 * Read and parse an alignment file with the codec registered for its
 * extension. An unknown extension fails before the file is opened.
 */
export function readAlignmentFile(
  filePath: string,
  registry: CodecRegistryService = defaultRegistry
): WordData[] {
  const codec = registry.forPath(filePath);
  const content = fs.readFileSync(filePath, 'utf8').replace(/^\uFEFF/, '');

  logger.debug(`Reading ${codec.format} alignment`, { path: filePath, bytes: content.length });
  return codec.parse(content, { source: path.basename(filePath) });
}

export function writeAlignmentFile(
  filePath: string,
  words: readonly WordData[],
  registry: CodecRegistryService = defaultRegistry
): void {
  const codec = registry.forPath(filePath);
  const content = codec.serialize(words, {
    source: path.basename(filePath),
    name: path.basename(filePath, path.extname(filePath)),
  });

  fs.writeFileSync(filePath, content, 'utf8');
  logger.debug(`Wrote ${codec.format} alignment`, { path: filePath, words: words.length });
}
