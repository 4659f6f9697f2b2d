import {readFileSync} from 'fs';
import {Either, isLeft, left, right} from 'fp-ts/lib/Either';
import {PathReporter} from 'io-ts/lib/PathReporter';

import {ReadingVariant, TCandidateTable} from './interfaces';
import {kata2hira} from './kana';

/**
 * Per-kanji readings, in the order the aligner should try them. Implementations must be read-only: the same provider
 * is shared by every alignment.
 */
export interface ReadingCandidateProvider {
  candidates(kanji: string): readonly string[];
}

const OKURIGANA = '.';
const AFFIX = '-';

export class CandidateTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CandidateTableError';
  }
}

/**
 * Expand one raw KANJIDIC-style reading into the variants the aligner can match.
 *
 * - `'み.る'` gives the full `'みる'` and then the stem `'み'`
 * - `'-い.り'` (a suffix reading, often only seen voiced) gives `'いり'` and `'い'`: the dash is dropped, rendaku is
 *   tried by the aligner itself
 * - `'セン'` gives `'せん'`
 *
 * Empty variants (e.g. from a bare `'-'`) are dropped, and so are repeats.
 */
export function readingVariants(raw: string): ReadingVariant[] {
  const strip = (s: string) => kata2hira(s.split(AFFIX).join('').split(OKURIGANA).join(''));

  const ret: ReadingVariant[] = [{reading: strip(raw), source: 'full', raw}];
  const dot = raw.indexOf(OKURIGANA);
  if (dot >= 0) { ret.push({reading: strip(raw.slice(0, dot)), source: 'stem', raw}); }

  const seen: Set<string> = new Set();
  return ret.filter(v => {
    if (!v.reading || seen.has(v.reading)) { return false; }
    seen.add(v.reading);
    return true;
  });
}

/**
 * Build a provider from a plain object, e.g. `{秋: ['シュウ', 'あき', 'とき']}`. The table is copied, so later changes
 * to `table` are not seen by the provider.
 */
export function candidateTable(table: Record<string, readonly string[]>): ReadingCandidateProvider {
  const map: Map<string, readonly string[]> = new Map([]);
  for (const [kanji, readings] of Object.entries(table)) { map.set(kanji, Object.freeze(readings.slice())); }
  const none: readonly string[] = Object.freeze([]);
  return {candidates: kanji => map.get(kanji) || none};
}

export function decodeCandidateTable(json: unknown): Either<string, ReadingCandidateProvider> {
  const decoded = TCandidateTable.decode(json);
  if (isLeft(decoded)) { return left(PathReporter.report(decoded).join('\n')); }
  return right(candidateTable(decoded.right));
}

/**
 * Read a JSON object of kanji to reading lists. Throws `CandidateTableError` if the file isn't valid JSON or isn't
 * shaped like `Record<string, string[]>`.
 */
export function loadCandidateTable(path: string): ReadingCandidateProvider {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf8'));
  } catch (e) {
    throw new CandidateTableError(`failed to read candidate table ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const res = decodeCandidateTable(json);
  if (isLeft(res)) { throw new CandidateTableError(`bad candidate table ${path}: ${res.left}`); }
  return res.right;
}
