import path from 'path';
import { Alignment } from '../models/Alignment';
import { Phoneme } from '../models/Phoneme';
import { Word } from '../models/Word';

export const fixture = (name: string): string => path.join(__dirname, 'fixtures', name);

/** sp | THE | CAT | sp | SAT, 0 to 0.9 s */
export const loadTheCatSat = (): Alignment => Alignment.fromFile(fixture('the-cat-sat.json'));

export const word = (label: string, ...phonemes: [string, number, number][]): Word =>
  new Word(label, phonemes.map(([phoneme, start, end]) => new Phoneme(phoneme, start, end)));
