import test from 'tape';

import {kata2hira} from '../kana';

test('kata2hira', t => {
  t.equal(kata2hira('イリミナイカワ'), 'いりみないかわ');
  t.equal(kata2hira('ヴァイオリン'), 'ゔぁいおりん');
  t.equal(kata2hira('ヵヶ'), 'ゕゖ');
  // outside ァ through ヶ: untouched
  t.equal(kata2hira('ラーメン・ヽ'), 'らーめん・ヽ');
  t.equal(kata2hira('秋田abc'), '秋田abc');
  t.end();
});

test('kata2hira leaves hiragana alone', t => {
  for (const s of ['', 'あきた', 'ゔぁいおりん', 'らーめん']) { t.equal(kata2hira(s), s); }
  t.equal(kata2hira(kata2hira('アキタ')), 'あきた');
  t.end();
});
