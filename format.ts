import {Alignment, Furigana, FuriganaDisplay, Ruby} from './interfaces';

/**
 * Render an alignment as one line of text.
 *
 * `'sparse'` annotates only kanji that got a reading, as `[秋|あき][田|た]`, and prints everything else verbatim.
 *
 * `'dense'` replaces every kanji by its bracketed reading, even an empty `[]`, so each kanji keeps a column:
 * `[いり][み][ない][かわ]`. Kana and other characters print as-is, followed by any unattached reading.
 */
export function formatAlignment(alignment: Alignment, display: FuriganaDisplay): string {
  if (display === 'dense') {
    return alignment.units.map(u => u.kind === 'logographic' ? `[${u.furigana}]` : u.text).join('') +
           alignment.trailing;
  }
  return alignment.units.map(u => u.kind === 'logographic' && u.furigana ? `[${u.text}|${u.furigana}]` : u.text)
      .join('');
}

/**
 * Convert to the ruby/rt representation used by JMDict-Furigana: kanji with a reading become `{ruby, rt}`, runs of
 * everything else are merged into plain strings.
 */
export function alignmentToFurigana(alignment: Alignment): Furigana[] {
  const ret: Furigana[] = [];
  for (const u of alignment.units) {
    const elt: Furigana = u.kind === 'logographic' && u.furigana ? {ruby: u.text, rt: u.furigana} : u.text;
    const last = ret[ret.length - 1];
    if (typeof elt === 'string' && typeof last === 'string') {
      ret[ret.length - 1] = last + elt;
    } else {
      ret.push(elt);
    }
  }
  return ret;
}

export function furiganaToString(fs: Furigana[]): string {
  return fs.map(f => typeof f === 'string' ? f : `${f.ruby}{${f.rt}}`).join('');
}

export function furiganaToRuby(fs: Furigana[]): string {
  const rubiesToHtml = (v: Ruby[]) =>
      v.length ? `<ruby>${v.map(o => o.ruby).join('')}<rt>${v.map(o => o.rt).join('')}</rt></ruby>` : '';
  // collapse adjacent <ruby> tags into one so selecting the resulting HTML picks up the whole word
  const ret = fs.reduce(({stringSoFar, rubiesSoFar}, curr) =>
                            typeof curr === 'object'
                                ? {stringSoFar, rubiesSoFar: rubiesSoFar.concat(curr)}
                                : {stringSoFar: stringSoFar + rubiesToHtml(rubiesSoFar) + curr, rubiesSoFar: []},
                        {stringSoFar: '', rubiesSoFar: [] as Ruby[]});
  return ret.stringSoFar + rubiesToHtml(ret.rubiesSoFar);
}
