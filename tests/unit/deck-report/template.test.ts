/**
 * Template Engine Tests
 */

import { describe, it, expect } from 'vitest';

import { findUnresolvedPlaceholders, renderTemplate } from '@/modules/deck-report/core/template.js';

const tokensOf = (entries: Record<string, string>): ReadonlyMap<string, string> =>
  new Map(Object.entries(entries));

describe('renderTemplate', () => {
  it('leaves unknown placeholders literal', () => {
    const output = renderTemplate('{n_cards} and {unknown_token}', tokensOf({ n_cards: '2' }));

    expect(output).toBe('2 and {unknown_token}');
  });

  it('returns a template without placeholders unchanged', () => {
    const template = '<html><body>{ not a token } {} {1x} plain</body></html>';

    expect(renderTemplate(template, tokensOf({ n_cards: '2' }))).toBe(template);
  });

  it('replaces every occurrence', () => {
    expect(renderTemplate('{a}-{a}-{b}{a}', tokensOf({ a: '1', b: '2' }))).toBe('1-1-21');
  });

  it('does not rescan substituted values', () => {
    const tokens = tokensOf({ cards: '<i>{n_cards}</i>', n_cards: '2' });

    expect(renderTemplate('{cards} / {n_cards}', tokens)).toBe('<i>{n_cards}</i> / 2');
  });

  it('gives the same output whatever the token insertion order', () => {
    const template = '{x}{y}';
    const forward = new Map([
      ['x', '{y}'],
      ['y', '{x}'],
    ]);
    const backward = new Map([
      ['y', '{x}'],
      ['x', '{y}'],
    ]);

    expect(renderTemplate(template, forward)).toBe('{y}{x}');
    expect(renderTemplate(template, backward)).toBe('{y}{x}');
  });

  it('inserts values literally, including $ sequences', () => {
    expect(renderTemplate('{price}', tokensOf({ price: "$& $1 $$ $'" }))).toBe("$& $1 $$ $'");
  });

  it('substitutes an empty value', () => {
    expect(renderTemplate('[{cards}]', tokensOf({ cards: '' }))).toBe('[]');
  });

  it('replaces the inner placeholder of doubled braces', () => {
    expect(renderTemplate('{{n_cards}}', tokensOf({ n_cards: '2' }))).toBe('{2}');
  });
});

describe('findUnresolvedPlaceholders', () => {
  it('lists unknown names once, in order of appearance', () => {
    const template = '{b} {n_cards} {a} {b}';

    expect(findUnresolvedPlaceholders(template, tokensOf({ n_cards: '2' }))).toEqual(['b', 'a']);
  });

  it('returns nothing when every placeholder resolves', () => {
    expect(findUnresolvedPlaceholders('{n_cards}', tokensOf({ n_cards: '2' }))).toEqual([]);
  });
});
