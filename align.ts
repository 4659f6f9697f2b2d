import {ReadingCandidateProvider, readingVariants} from './candidates';
import {toUnits} from './characters';
import {segmentFallback} from './fallback';
import {formatAlignment} from './format';
import {AlignedUnit, AlignOptions, AlignResult, FuriganaDisplay, TraceStep, Unit} from './interfaces';
import {kata2hira} from './kana';
import {rendaku} from './rendaku';

/**
 * Line up the kanji of `surface` with the parts of `reading` they're pronounced as.
 *
 * This is a depth-first search over (surface position, reading cursor). Each kanji tries its candidate readings in the
 * order the provider lists them, full reading before okurigana stem, literal before rendaku, and the first choice that
 * lets the rest of the surface consume the rest of the reading wins. So `align('入見内川', 'イリミナイカワ', p)` tries
 * 入=い first, fails to place 見 at り, backs up, and settles on 入=いり, 見=み, 内=ない, 川=かわ.
 *
 * Kana in the surface must match the reading exactly (katakana and hiragana compare equal) and get no furigana of their
 * own. Anything else (punctuation, digits, 々) matches nothing and consumes nothing.
 *
 * Only if no exact alignment exists is the search rerun with tail absorption (see `AlignOptions`), and only if that
 * fails too is the reading split evenly across the kanji via `segmentFallback`, with `succeeded` false. This never
 * throws.
 */
export function align(surface: string, reading: string, provider: ReadingCandidateProvider,
                      options: AlignOptions = {}): AlignResult {
  const {tailAbsorption = true} = options;
  const units = toUnits(surface);
  const normalized = kata2hira(reading);
  const chars = [...normalized];
  const trace: TraceStep[] = [];

  // index of the last kanji, -1 if none
  let lastKanji = -1;
  units.forEach((u, i) => { if (u.kind === 'logographic') { lastKanji = i; } });
  // how many kana come after the last kanji: the most reading that tail absorption must leave for them
  const trailingKana = units.slice(lastKanji + 1).filter(u => u.kind === 'phonetic').length;

  const readingAt = (k: number, length: number) => chars.slice(k, k + length).join('');
  const step = (unit: Unit, j: number, k: number) => ({position: j, cursor: k, unit: unit.text});
  // only set for the second pass, once no exact alignment exists
  let absorbing = false;

  function recur(j: number, k: number): AlignedUnit[]|undefined {
    if (j >= units.length) {
      if (k === chars.length) { return []; }
      trace.push({event: 'mismatch', position: j, cursor: k, unit: '', reason: 'reading left over'});
      return undefined;
    }
    const unit = units[j];

    if (unit.kind === 'other') {
      trace.push({event: 'other', ...step(unit, j, k)});
      const rest = recur(j + 1, k);
      return rest && [{...unit, furigana: '', consumed: 0}, ...rest];
    }

    if (unit.kind === 'phonetic') {
      if (k < chars.length && chars[k] === kata2hira(unit.text)) {
        trace.push({event: 'phonetic', ...step(unit, j, k)});
        const rest = recur(j + 1, k + 1);
        return rest && [{...unit, furigana: '', consumed: 1}, ...rest];
      }
      trace.push({event: 'mismatch', ...step(unit, j, k), reason: 'kana does not match reading'});
      return undefined;
    }

    const candidates = provider.candidates(unit.text);
    trace.push({event: 'candidates', ...step(unit, j, k), candidates});
    for (const raw of candidates) {
      for (const variant of readingVariants(raw)) {
        const length = [...variant.reading].length;
        const here = readingAt(k, length);
        let matched = variant.reading;
        let voiced = false;
        if (here !== matched) {
          if (j === 0) { continue; }
          matched = rendaku(variant.reading);
          voiced = true;
          if (here !== matched) { continue; }
        }
        trace.push({event: 'match', ...step(unit, j, k), variant, matched, rendaku: voiced});
        const rest = recur(j + 1, k + length);
        if (rest) { return [{...unit, furigana: matched, consumed: length}, ...rest]; }
        trace.push({event: 'backtrack', ...step(unit, j, k), matched});
      }
    }

    if (absorbing && j === lastKanji) {
      const end = chars.length - trailingKana;
      if (end > k) {
        const matched = readingAt(k, end - k);
        trace.push({event: 'absorb', ...step(unit, j, k), matched});
        const rest = recur(j + 1, end);
        if (rest) { return [{...unit, furigana: matched, consumed: end - k}, ...rest]; }
        trace.push({event: 'backtrack', ...step(unit, j, k), matched});
      }
    }

    trace.push(
        {event: 'mismatch', ...step(unit, j, k), reason: candidates.length ? 'no candidate matched' : 'no candidates'});
    return undefined;
  }

  let found = recur(0, 0);
  if (!found && tailAbsorption) {
    absorbing = true;
    found = recur(0, 0);
  }
  if (found) {
    return {
      alignment: Object.freeze({units: Object.freeze(found), trailing: ''}),
      succeeded: true,
      reading: normalized,
      trace,
    };
  }
  trace.push({event: 'fallback', surface, reading: normalized});
  return {alignment: segmentFallback(surface, reading), succeeded: false, reading: normalized, trace};
}

/**
 * Holds one candidate provider and alignment options, built once and shared by every alignment.
 */
export class FuriganaAligner {
  constructor(readonly provider: ReadingCandidateProvider, readonly options: AlignOptions = {}) {}

  align(surface: string, reading: string): AlignResult {
    return align(surface, reading, this.provider, this.options);
  }

  format(surface: string, reading: string, display: FuriganaDisplay): string {
    return formatAlignment(this.align(surface, reading).alignment, display);
  }
}
