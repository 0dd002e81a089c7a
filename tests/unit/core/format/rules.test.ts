import { describe, it, expect } from 'vitest';
import { PlaceholderStore, replacePattern, runRules } from '../../../../src/core/format/rules.js';
import { decodeEntities, escapeHtml } from '../../../../src/core/format/html.js';

describe('runRules', () => {
  it('applies rules in order, each on the previous output', () => {
    const out = runRules('a-b', [
      { name: 'dash', pattern: /-/g, rewrite: () => '+' },
      { name: 'plus', pattern: /\+/g, rewrite: () => ' plus ' },
    ]);
    expect(out).toBe('a plus b');
  });

  it('treats a non-global pattern as global', () => {
    expect(replacePattern('x1y2', /\d/, (m) => `[${m[0]}]`)).toBe('x[1]y[2]');
  });
});

describe('PlaceholderStore', () => {
  it('hides protected text from later rules and restores it', () => {
    const store = new PlaceholderStore('T');
    const text = `keep ${store.protect('*raw*')} and *this*`;
    const rewritten = replacePattern(text, /\*(\w+)\*/g, (m) => `<em>${m[1]}</em>`);

    expect(store.size).toBe(1);
    expect(store.restore(rewritten)).toBe('keep *raw* and <em>this</em>');
  });

  it('only restores its own tag', () => {
    const a = new PlaceholderStore('A');
    const b = new PlaceholderStore('B');
    const tokenB = b.protect('two');
    const text = `${a.protect('one')}|${tokenB}`;

    expect(a.restore(text)).toBe(`one|${tokenB}`);
    expect(b.restore(a.restore(text))).toBe('one|two');
  });

  it('map rewrites protected values and keeps them protected', () => {
    const store = new PlaceholderStore('T');
    const text = `> ${store.protect('a\nb')}`;
    const mapped = store.map(text, (value) => value.replace(/\n/g, '\n> '));

    expect(mapped).not.toContain('\n');
    expect(store.restore(mapped)).toBe('> a\n> b');
  });
});

describe('html helpers', () => {
  it('escapes the five reserved characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  it('decodes named and numeric entities', () => {
    expect(decodeEntities('&lt;&#65;&#x42;&nbsp;&unknown;')).toBe('<AB &unknown;');
  });
});
