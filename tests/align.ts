import path from 'path';
import test from 'tape';

import {align, FuriganaAligner} from '../align';
import {candidateTable, loadCandidateTable} from '../candidates';
import {countLogographic, toUnits} from '../characters';
import {AlignResult} from '../interfaces';

const provider = loadCandidateTable(path.join(__dirname, 'candidates.json'));
const furigana = (res: AlignResult) => res.alignment.units.map(u => u.furigana);
const consumed = (res: AlignResult) => res.alignment.units.reduce((sum, u) => sum + u.consumed, 0);

test('秋田', t => {
  const res = align('秋田', 'アキタ', provider);
  t.ok(res.succeeded);
  t.equal(res.reading, 'あきた');
  t.deepEqual(furigana(res), ['あき', 'た']);
  t.deepEqual(res.alignment.units.map(u => u.consumed), [2, 1]);
  t.equal(res.alignment.trailing, '');
  t.end();
});

test('入見内川 needs backtracking', t => {
  const res = align('入見内川', 'イリミナイカワ', provider);
  t.ok(res.succeeded);
  t.deepEqual(furigana(res), ['いり', 'み', 'ない', 'かわ']);
  // 入=い was tried and abandoned before 入=いり
  t.ok(res.trace.some(s => s.event === 'backtrack' && s.unit === '入' && s.matched === 'い'));
  t.end();
});

test('kana in the surface get no furigana but consume the reading', t => {
  const res = align('た', 'タ', provider);
  t.ok(res.succeeded);
  t.deepEqual(res.alignment.units, [{text: 'た', kind: 'phonetic', furigana: '', consumed: 1}]);

  const katakana = align('タ', 'た', provider);
  t.ok(katakana.succeeded);
  t.equal(consumed(katakana), 1);
  t.end();
});

test('okurigana stem', t => {
  const res = align('食べる', 'たべる', provider);
  t.ok(res.succeeded);
  t.deepEqual(furigana(res), ['た', '', '']);
  // the full reading たべる matched first and left nothing for べる
  t.ok(res.trace.some(s => s.event === 'backtrack' && s.unit === '食' && s.matched === 'たべる'));
  t.end();
});

test('rendaku on non-initial kanji', t => {
  const res = align('小川', 'おがわ', provider);
  t.ok(res.succeeded);
  t.deepEqual(furigana(res), ['お', 'がわ']);
  t.ok(res.trace.some(s => s.event === 'match' && s.rendaku && s.unit === '川' && s.matched === 'がわ'));
  t.end();
});

test('no rendaku on the first unit', t => {
  const res = align('川', 'がわ', provider, {tailAbsorption: false});
  t.notOk(res.succeeded);
  t.notOk(res.trace.some(s => s.event === 'match'));
  t.end();
});

test('other characters consume nothing', t => {
  const res = align('秋、田', 'あきた', provider);
  t.ok(res.succeeded);
  t.deepEqual(res.alignment.units.map(u => [u.text, u.kind, u.furigana, u.consumed]),
              [['秋', 'logographic', 'あき', 2], ['、', 'other', '', 0], ['田', 'logographic', 'た', 1]]);
  t.end();
});

test('tail absorption', t => {
  {
    // no candidates at all, one kanji
    const res = align('鬱', 'うつ', provider);
    t.ok(res.succeeded);
    t.deepEqual(furigana(res), ['うつ']);
    t.ok(res.trace.some(s => s.event === 'absorb'));
  }
  {
    // absorption leaves room for trailing kana
    const res = align('鬱だ', 'うつだ', provider);
    t.ok(res.succeeded);
    t.deepEqual(furigana(res), ['うつ', '']);
  }
  {
    // あき matches but leaves た over, so the last kanji takes everything
    const res = align('秋', 'あきた', provider);
    t.ok(res.succeeded);
    t.deepEqual(furigana(res), ['あきた']);
  }
  {
    const res = align('鬱', 'うつ', provider, {tailAbsorption: false});
    t.notOk(res.succeeded);
    t.deepEqual(furigana(res), ['うつ']);
    t.equal(res.trace[res.trace.length - 1].event, 'fallback');
  }
  t.end();
});

test('an exact alignment beats tail absorption', t => {
  const p = candidateTable({入: ['ニュウ', 'い.る', '-い.り'], 口: ['コウ', 'くち']});
  // 入=い is tried first, and 口 could absorb りぐち, but 入=いり with a voiced 口 fits exactly
  const res = align('入口', 'いりぐち', p);
  t.ok(res.succeeded);
  t.deepEqual(furigana(res), ['いり', 'ぐち']);
  t.notOk(res.trace.some(s => s.event === 'absorb'));
  t.deepEqual(furigana(align('入口', 'いりぐち', p, {tailAbsorption: false})), ['いり', 'ぐち']);
  t.end();
});

test('reading too short falls back to even segments', t => {
  const res = align('入見内川', 'いりみ', provider);
  t.notOk(res.succeeded);
  t.deepEqual(furigana(res), ['い', 'り', 'み', '']);
  t.equal(consumed(res), 3);
  t.end();
});

test('mismatched kana', t => {
  const res = align('たべる', 'たべた', provider);
  t.notOk(res.succeeded);
  t.deepEqual(furigana(res), ['た', 'べ', '']);
  t.equal(res.alignment.trailing, 'た');
  t.end();
});

test('empty input', t => {
  const empty = align('', '', provider);
  t.ok(empty.succeeded);
  t.deepEqual(empty.alignment.units, []);

  const noReading = align('秋', '', provider);
  t.notOk(noReading.succeeded);
  t.deepEqual(furigana(noReading), ['']);

  const noSurface = align('', 'あき', provider);
  t.notOk(noSurface.succeeded);
  t.equal(noSurface.alignment.trailing, 'あき');
  t.end();
});

test('every alignment covers the surface and never overspends the reading', t => {
  const pairs: [string, string][] = [
    ['秋田', 'アキタ'],
    ['入見内川', 'イリミナイカワ'],
    ['入見内川', 'いりみ'],
    ['小川さん', 'オガワサン'],
    ['食べ物', 'たべもの'],
    ['本日は晴天', 'ホンジツハセイテン'],
    ['ABC秋', 'エービーシーアキ'],
    ['日々', 'ひび'],
    ['秋田', 'abc'],
    ['', 'あ'],
  ];
  for (const [surface, reading] of pairs) {
    const res = align(surface, reading, provider);
    t.equal(res.alignment.units.map(u => u.text).join(''), surface, surface);
    const total = [...res.reading].length;
    if (res.succeeded) {
      t.equal(consumed(res), total, `${surface} consumes all of ${reading}`);
      t.equal(res.alignment.trailing, '');
    } else {
      t.ok(consumed(res) + [...res.alignment.trailing].length <= total, `${surface} within ${reading}`);
      t.equal(res.alignment.units.filter(u => u.kind === 'logographic').length, countLogographic(toUnits(surface)));
    }
  }
  t.end();
});

test('candidate order decides ties', t => {
  // なまな splits as な+まな or as なま+な: whichever 生 lists first wins
  const naFirst = candidateTable({生: ['な', 'なま'], 麦: ['まな', 'な']});
  t.deepEqual(furigana(align('生麦', 'なまな', naFirst, {tailAbsorption: false})), ['な', 'まな']);

  const namaFirst = candidateTable({生: ['なま', 'な'], 麦: ['まな', 'な']});
  t.deepEqual(furigana(align('生麦', 'なまな', namaFirst, {tailAbsorption: false})), ['なま', 'な']);
  t.end();
});

test('FuriganaAligner', t => {
  const aligner = new FuriganaAligner(provider);
  t.equal(aligner.format('入見内川', 'イリミナイカワ', 'dense'), '[いり][み][ない][かわ]');
  t.equal(aligner.format('秋田', 'アキタ', 'sparse'), '[秋|あき][田|た]');
  t.deepEqual(furigana(aligner.align('秋田', 'アキタ')), ['あき', 'た']);
  t.end();
});
