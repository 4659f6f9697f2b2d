import {countLogographic, toUnits} from './characters';
import {AlignedUnit, Alignment} from './interfaces';
import {kata2hira} from './kana';

/**
 * Split `total` into `n` lengths that differ by at most one, longer ones first: `segmentLengths(7, 3)` is `[3, 2, 2]`.
 * Lengths can be zero when `total < n`.
 */
export function segmentLengths(total: number, n: number): number[] {
  if (n <= 0) { return []; }
  const base = Math.floor(total / n);
  const extra = total % n;
  return Array.from({length: n}, (_, i) => base + (i < extra ? 1 : 0));
}

/**
 * When there's no way to line up kanji readings with the reading, split the reading evenly across the kanji.
 *
 * Each kanji's share is decided when it's reached: what's left of the reading, less one mora for each kana still ahead,
 * is divided over the kanji still ahead, so `segmentFallback('たの秋田', 'たのあきた')` gives 秋=あき and 田=た. Each
 * kanji gets at least one mora while the reading lasts. Kana in the surface claim their own mora when the reading has
 * that kana at the cursor. A surface without any kanji leaves what's left of the reading in `trailing`. This never
 * consumes more than the reading has.
 */
export function segmentFallback(surface: string, reading: string): Alignment {
  const units = toUnits(surface);
  const chars = [...kata2hira(reading)];
  let kanjiLeft = countLogographic(units);
  let kanaLeft = units.filter(u => u.kind === 'phonetic').length;

  let k = 0;
  const aligned: AlignedUnit[] = units.map(u => {
    if (u.kind === 'logographic') {
      const remaining = chars.length - k;
      const budget = Math.max(remaining - kanaLeft, Math.min(remaining, kanjiLeft));
      const take = segmentLengths(budget, kanjiLeft--)[0];
      const furigana = chars.slice(k, k + take).join('');
      k += take;
      return {...u, furigana, consumed: take};
    }
    if (u.kind === 'phonetic') {
      kanaLeft--;
      if (k < chars.length && chars[k] === kata2hira(u.text)) {
        k++;
        return {...u, furigana: u.text, consumed: 1};
      }
    }
    return {...u, furigana: '', consumed: 0};
  });

  const trailing = countLogographic(units) === 0 ? chars.slice(k).join('') : '';
  return Object.freeze({units: Object.freeze(aligned), trailing});
}
