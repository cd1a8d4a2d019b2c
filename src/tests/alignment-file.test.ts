import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Alignment } from '../models/Alignment';
import { CodecRegistryService } from '../services/codec-registry.service';
import type { AlignmentCodec } from '../services/codecs/codec.interface';
import { JsonCodec } from '../services/codecs/json.codec';
import type { WordData } from '../types/alignment.types';
import { EmptyAlignmentError, UnsupportedFormatError } from '../utils/errors';
import { loadTheCatSat } from './helpers';

/** One phoneme per line: "label start end" */
class PlainCodec implements AlignmentCodec {
  readonly format = 'plain';
  readonly extensions = ['.lab'];

  parse(content: string): WordData[] {
    return content
      .trim()
      .split('\n')
      .map((line) => {
        const [label, start, end] = line.split(' ');
        return { label, phonemes: [{ label, start: Number(start), end: Number(end) }] };
      });
  }

  serialize(words: readonly WordData[]): string {
    return words
      .flatMap((word) => word.phonemes.map((p) => `${p.label} ${p.start} ${p.end}`))
      .join('\n');
  }
}

describe('Alignment files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'phonalign-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it.each(['utt.json', 'utt.TextGrid', 'utt.mlf'])('saves and loads %s', (name) => {
    const alignment = loadTheCatSat();
    const file = path.join(dir, name);

    alignment.save(file);

    expect(Alignment.fromFile(file).equals(alignment)).toBe(true);
  });

  it('names the MLF label file after the saved file', () => {
    const file = path.join(dir, 'utt7.mlf');

    loadTheCatSat().save(file);

    expect(fs.readFileSync(file, 'utf8').split('\n')[1]).toBe('"*/utt7.lab"');
  });

  it('matches extensions case-insensitively', () => {
    const alignment = loadTheCatSat();
    const file = path.join(dir, 'UTT.JSON');

    alignment.save(file);

    expect(Alignment.fromFile(file).equals(alignment)).toBe(true);
  });

  it('ignores a byte-order mark', () => {
    const file = path.join(dir, 'bom.json');
    fs.writeFileSync(file, `\uFEFF${new JsonCodec().serialize(loadTheCatSat().toData())}`);

    expect(Alignment.fromFile(file).toText()).toBe('THE CAT SAT');
  });

  it('refuses an unknown extension without touching the file system', () => {
    const file = path.join(dir, 'utt.wav');

    expect(() => loadTheCatSat().save(file)).toThrow(UnsupportedFormatError);
    expect(() => loadTheCatSat().save(file)).toThrow(
      'No alignment codec for extension ".wav". Available: .json, .mlf, .textgrid'
    );
    expect(fs.existsSync(file)).toBe(false);
    expect(() => Alignment.fromFile(file)).toThrow(UnsupportedFormatError);
  });

  it('refuses to save an empty alignment', () => {
    const empty = Alignment.fromWords([]);

    expect(() => empty.save(path.join(dir, 'empty.json'))).toThrow(EmptyAlignmentError);
    expect(() => empty.save(path.join(dir, 'empty.wav'))).toThrow(UnsupportedFormatError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('uses codecs registered on a custom registry', () => {
    const registry = new CodecRegistryService().register(new PlainCodec());
    const file = path.join(dir, 'utt.lab');
    fs.writeFileSync(file, 'sp 0 0.5\nA 0.5 0.75\n');

    const alignment = Alignment.fromFile(file, { registry });
    expect(alignment.toText()).toBe('A');
    expect(alignment.end()).toBe(0.75);

    const copy = path.join(dir, 'copy.lab');
    alignment.slice(1).save(copy);
    expect(fs.readFileSync(copy, 'utf8')).toBe('A 0.5 0.75');
    expect(() => alignment.save(path.join(dir, 'utt.json'))).toThrow(UnsupportedFormatError);
  });
});
