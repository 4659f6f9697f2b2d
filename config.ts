import {config as loadDotenv} from 'dotenv';
import {isLeft} from 'fp-ts/lib/Either';
import * as t from 'io-ts';
import {PathReporter} from 'io-ts/lib/PathReporter';

import {FuriganaDisplay, TFuriganaDisplay} from './interfaces';

export interface Config {
  display: FuriganaDisplay;
  tailAbsorption: boolean;
  /** Print every alignment's decision steps to stderr */
  trace: boolean;
  /** JSON file of kanji to candidate readings */
  candidatesPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const TFlag = t.keyof({true: null, false: null, '1': null, '0': null});
const TEnv = t.partial({
  FURIGANA_DISPLAY: TFuriganaDisplay,
  FURIGANA_TAIL_ABSORPTION: TFlag,
  FURIGANA_TRACE: TFlag,
  FURIGANA_CANDIDATES: t.string,
});

const flag = (s: string|undefined, fallback: boolean) => s === undefined ? fallback : s === 'true' || s === '1';

/**
 * Read settings from environment variables. Unset variables take their defaults (sparse display, tail absorption on,
 * tracing off); set-but-invalid ones throw `ConfigError`.
 */
export function loadConfig(env: Record<string, string|undefined> = process.env): Config {
  // empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const decoded = TEnv.decode(present);
  if (isLeft(decoded)) { throw new ConfigError('bad environment: ' + PathReporter.report(decoded).join('; ')); }
  const {FURIGANA_DISPLAY, FURIGANA_TAIL_ABSORPTION, FURIGANA_TRACE, FURIGANA_CANDIDATES} = decoded.right;
  return {
    display: FURIGANA_DISPLAY || 'sparse',
    tailAbsorption: flag(FURIGANA_TAIL_ABSORPTION, true),
    trace: flag(FURIGANA_TRACE, false),
    candidatesPath: FURIGANA_CANDIDATES,
  };
}

/**
 * Like `loadConfig` but first merges a `.env` file (if any) into `process.env`. Variables already set win.
 */
export function loadConfigFromDotenv(path?: string): Config {
  const {error} = loadDotenv(path ? {path} : undefined);
  // a missing .env is fine
  if (error && !('code' in error && error.code === 'ENOENT')) {
    throw new ConfigError(`failed to read ${path || '.env'}: ${error.message}`);
  }
  return loadConfig(process.env);
}
