import {CharClass, Unit} from './interfaces';

const inRange = (cp: number, lo: number, hi: number) => cp >= lo && cp <= hi;

/**
 * Classify one code point by Unicode block: CJK Unified Ideographs are logographic, the hiragana and katakana blocks
 * are phonetic, and everything else (including 々, digits and punctuation) is "other".
 *
 * Only the first code point of `c` is looked at. An empty string is "other".
 */
export function classify(c: string): CharClass {
  const cp = c.codePointAt(0);
  if (cp === undefined) { return 'other'; }
  if (inRange(cp, 0x4e00, 0x9fff)) { return 'logographic'; }
  if (inRange(cp, 0x3040, 0x309f) || inRange(cp, 0x30a0, 0x30ff)) { return 'phonetic'; }
  return 'other';
}

export const hasKanji = (s: string): boolean => [...s].some(c => classify(c) === 'logographic');

export function toUnits(s: string): Unit[] { return [...s].map(text => ({text, kind: classify(text)})); }

export function countLogographic(units: readonly Unit[]): number {
  return units.filter(u => u.kind === 'logographic').length;
}
