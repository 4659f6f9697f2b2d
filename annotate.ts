import {Either, isLeft, left, right} from 'fp-ts/lib/Either';
import * as t from 'io-ts';
import {PathReporter} from 'io-ts/lib/PathReporter';

import {FuriganaAligner} from './align';
import {loadCandidateTable, ReadingCandidateProvider} from './candidates';
import {hasKanji} from './characters';
import {Config, ConfigError} from './config';
import {segmentFallback} from './fallback';
import {formatAlignment} from './format';
import {AlignResult, AnnotatedToken, DictionaryEntry, Token, TToken} from './interfaces';

/**
 * Build the aligner described by `config`. Pass `provider` to skip reading `config.candidatesPath`.
 */
export function setup(config: Config, provider?: ReadingCandidateProvider): FuriganaAligner {
  if (!provider) {
    if (!config.candidatesPath) { throw new ConfigError('no candidate readings: set FURIGANA_CANDIDATES'); }
    provider = loadCandidateTable(config.candidatesPath);
  }
  return new FuriganaAligner(provider, {tailAbsorption: config.tailAbsorption});
}

/**
 * Furigana for a kanji-free surface from its dictionary entry: only if the entry's headword is exactly `surface`, the
 * entry's first reading is laid out over it and each annotated piece is bracketed, e.g. `[ま][た]`. Otherwise `''`.
 */
export function dictionaryFurigana(surface: string, entry: DictionaryEntry = {}): string {
  const {kanji = [], readings = []} = entry;
  if (!kanji.length || !readings.length || kanji[0] !== surface) { return ''; }
  return segmentFallback(surface, readings[0]).units.filter(u => u.furigana).map(u => `[${u.furigana}]`).join('');
}

function logAlignment(surface: string, reading: string, res: AlignResult) {
  console.error(JSON.stringify({
    surface,
    reading,
    succeeded: res.succeeded,
    steps: res.trace,
    result: res.alignment.units.map(u => [u.text, u.furigana]),
  }));
}

/**
 * Add `furiganaText` and `furiganaLemma` to a token from the morphological analyzer. Both are aligned against the
 * token's reading, since the analyzer only gives one. `succeeded` says whether the text (not the lemma) aligned exactly.
 */
export function annotateToken(token: Token, aligner: FuriganaAligner, config: Pick<Config, 'display'|'trace'>):
    AnnotatedToken {
  const {text, lemma = text, reading, dictionaryEntry} = token;

  const furiganaFor = (surface: string): {furigana: string, succeeded: boolean} => {
    if (!hasKanji(surface)) { return {furigana: dictionaryFurigana(surface, dictionaryEntry), succeeded: true}; }
    const res = aligner.align(surface, reading);
    if (config.trace) { logAlignment(surface, reading, res); }
    return {furigana: formatAlignment(res.alignment, config.display), succeeded: res.succeeded};
  };

  const fromText = furiganaFor(text);
  const fromLemma = lemma === text ? fromText : furiganaFor(lemma);
  return {...token, furiganaText: fromText.furigana, furiganaLemma: fromLemma.furigana, succeeded: fromText.succeeded};
}

export function annotateTokens(tokens: Token[], aligner: FuriganaAligner,
                               config: Pick<Config, 'display'|'trace'>): AnnotatedToken[] {
  return tokens.map(token => annotateToken(token, aligner, config));
}

export function decodeTokens(json: unknown): Either<string, Token[]> {
  const decoded = t.array(TToken).decode(json);
  return isLeft(decoded) ? left(PathReporter.report(decoded).join('\n')) : right(decoded.right);
}
