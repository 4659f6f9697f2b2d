const unvoiced = "かきくけこさしすせそたちつてとはひふへほ";
const voiced = "がぎぐげござじずぜぞだぢづでどばびぶべぼ";

if (unvoiced.length !== voiced.length) { throw new Error('Voicing table strings not same length?'); }

const voicing: Map<string, string> = new Map([]);
unvoiced.split('').forEach((c, i) => voicing.set(c, voiced[i]));

export const isVoiceable = (c: string): boolean => voicing.has(c);

/**
 * Rendaku: voice the first mora of a hiragana reading, as happens when a word is the non-initial part of a compound.
 * `rendaku('かわ')` is `'がわ'` (as in 小川, おがわ). Readings that don't start with a k/s/t/h-row kana come back as-is.
 */
export function rendaku(reading: string): string {
  const [first, ...rest] = [...reading];
  const hit = first === undefined ? undefined : voicing.get(first);
  return hit === undefined ? reading : hit + rest.join('');
}
