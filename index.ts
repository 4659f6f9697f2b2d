export * from './interfaces';

export {align, FuriganaAligner} from './align';
export {annotateToken, annotateTokens, decodeTokens, dictionaryFurigana, setup} from './annotate';
export {
  CandidateTableError,
  candidateTable,
  decodeCandidateTable,
  loadCandidateTable,
  readingVariants
} from './candidates';
export type{ReadingCandidateProvider} from './candidates';
export {classify, countLogographic, hasKanji, toUnits} from './characters';
export {ConfigError, loadConfig, loadConfigFromDotenv} from './config';
export type{Config} from './config';
export {segmentFallback, segmentLengths} from './fallback';
export {alignmentToFurigana, formatAlignment, furiganaToRuby, furiganaToString} from './format';
export {kata2hira} from './kana';
export {isVoiceable, rendaku} from './rendaku';
