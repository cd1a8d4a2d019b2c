import { z } from 'zod';

// ---------------------------------------------------------------------------
// JSON alignment documents
//
// Two layouts are read:
//   - word list:  { "words": [{ "alignedWord", "start", "end", "phonemes" }] }
//     An entry without phonemes is a silence word spanning start..end.
//   - label map:  { "<word>": [["<phone>", start, end], ...], ... }
//     Key order is word order.
// The word list is written by default: it holds repeated labels.
// ---------------------------------------------------------------------------

export const phonemeTripleSchema = z.tuple([z.string(), z.number(), z.number()]);
export type PhonemeTriple = z.infer<typeof phonemeTripleSchema>;

export const documentWordSchema = z.object({
  alignedWord: z.string().optional(),
  word: z.string().optional(),
  start: z.number().optional(),
  end: z.number().optional(),
  phonemes: z.array(phonemeTripleSchema).optional(),
});
export type DocumentWord = z.infer<typeof documentWordSchema>;

export const wordListDocumentSchema = z.object({
  words: z.array(documentWordSchema),
});
export type WordListDocument = z.infer<typeof wordListDocumentSchema>;

export const labelMapDocumentSchema = z.record(z.array(phonemeTripleSchema));
export type LabelMapDocument = z.infer<typeof labelMapDocumentSchema>;

export type AlignmentDocument = WordListDocument | LabelMapDocument;

export const JSON_LAYOUTS = ['words', 'labels'] as const;
export type JsonLayout = (typeof JSON_LAYOUTS)[number];
