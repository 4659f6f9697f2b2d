import * as t from 'io-ts';

export type CharClass = 'logographic'|'phonetic'|'other';

export interface Unit {
  text: string;
  kind: CharClass;
}
export interface AlignedUnit extends Unit {
  /** Reading shown above this unit. Always `''` for "other" units and, on a successful alignment, for kana. */
  furigana: string;
  /** How many code points of the normalized reading this unit accounts for */
  consumed: number;
}
export interface Alignment {
  units: readonly AlignedUnit[];
  /** Reading left over with nothing to attach it to. Only the fallback produces this. */
  trailing: string;
}

export type VariantSource = 'full'|'stem';
export interface ReadingVariant {
  reading: string;
  source: VariantSource;
  raw: string;
}

export type TraceStep = {
  event: 'candidates',
  position: number,
  cursor: number,
  unit: string,
  candidates: readonly string[],
}|{
  event: 'match',
  position: number,
  cursor: number,
  unit: string,
  variant: ReadingVariant,
  matched: string,
  rendaku: boolean,
}|{
  event: 'mismatch',
  position: number,
  cursor: number,
  unit: string,
  reason: 'no candidates'|'no candidate matched'|'kana does not match reading'|'reading left over',
}|{
  event: 'phonetic' | 'other',
  position: number,
  cursor: number,
  unit: string,
}|{
  event: 'absorb',
  position: number,
  cursor: number,
  unit: string,
  matched: string,
}|{
  event: 'backtrack',
  position: number,
  cursor: number,
  unit: string,
  matched: string,
}|{
  event: 'fallback',
  surface: string,
  reading: string,
};

export interface AlignResult {
  alignment: Alignment;
  succeeded: boolean;
  /** The reading after katakana-to-hiragana normalization, which is what `consumed` counts against */
  reading: string;
  trace: TraceStep[];
}

export type FuriganaDisplay = 'sparse'|'dense';
export const TFuriganaDisplay = t.keyof({sparse: null, dense: null});

export interface AlignOptions {
  /**
   * If the last kanji in the surface can't match any of its candidate readings, let it take all the remaining
   * reading (less whatever trailing kana need) instead of failing over to the proportional fallback. Only tried once
   * the search has found no exact alignment.
   */
  tailAbsorption?: boolean;
}

/** Same shape as JmdictFurigana's `Ruby`/`Furigana`, so its data and ours mix freely */
export interface Ruby {
  ruby: string;
  rt: string;
}
export type Furigana = string|Ruby;

export const TCandidateTable = t.record(t.string, t.array(t.string));

export const TDictionaryEntry = t.partial({kanji: t.array(t.string), readings: t.array(t.string)});
export type DictionaryEntry = t.TypeOf<typeof TDictionaryEntry>;

export const TToken = t.intersection([
  t.type({text: t.string, reading: t.string}),
  t.partial({lemma: t.string, dictionaryEntry: TDictionaryEntry}),
]);
export type Token = t.TypeOf<typeof TToken>;
export type AnnotatedToken = Token&{ furiganaText: string; furiganaLemma: string; succeeded: boolean; };
