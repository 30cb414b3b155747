import { describe, it, expect } from 'vitest';
import { bodyExpressions, declaredQueries, parseDocument, queryReferences } from '../src/core/document';
import { UnknownQueryReferenceError } from '../src/core/errors';
import { Nodes } from '../src/types';

describe('parseDocument', () => {
  it('fills frontmatter defaults', () => {
    const document = parseDocument({ body: [Nodes.text('hi')] });

    expect(document.frontmatter).toEqual({ filters: {}, pipes: {}, loads: {}, actions: {}, state: {} });
  });

  it('collects tag constraints of a filter', () => {
    const document = parseDocument({
      frontmatter: { filters: { feed: { kinds: [1], '#t': ['news'] } } },
      body: [],
    });

    expect(document.frontmatter.filters.feed.tags).toEqual({ t: ['news'] });
  });

  it('defaults the field and identifier of a load', () => {
    const document = parseDocument({ frontmatter: { loads: { profiles: { from: 'feed', kind: 0 } } }, body: [] });

    expect(document.frontmatter.loads.profiles).toEqual({ from: 'feed', kind: 0, field: 'pubkey', identifier: '' });
  });

  it('rejects malformed input', () => {
    expect(() => parseDocument({ body: 'not a list' })).toThrow(/^Invalid Livemark document/);
    expect(() => parseDocument({ body: [{ type: 'marquee' }] })).toThrow(/^Invalid Livemark document/);
  });
});

describe('declaredQueries', () => {
  it('splits raw and derived ids', () => {
    const document = parseDocument({
      frontmatter: {
        filters: { feed: { kinds: [1] } },
        loads: { profiles: { from: 'feed', kind: 0 } },
        pipes: { count: { from: 'feed', jq: 'feed | length' } },
      },
      body: [Nodes.expr('queries.count'), Nodes.each('queries.feed', 'n', [Nodes.expr('n.id')])],
    });

    const { raw, derived } = declaredQueries(document);

    expect([...raw]).toEqual(['feed', 'profiles']);
    expect([...derived]).toEqual(['count']);
  });

  it('rejects an id declared twice', () => {
    const document = parseDocument({
      frontmatter: { filters: { feed: { kinds: [1] } }, pipes: { feed: { from: 'feed', jq: '.' } } },
      body: [],
    });

    expect(() => declaredQueries(document)).toThrow("Query 'feed' is declared twice");
  });

  it('rejects a load reading an undeclared query', () => {
    const document = parseDocument({ frontmatter: { loads: { profiles: { from: 'feed', kind: 0 } } }, body: [] });

    expect(() => declaredQueries(document)).toThrow(UnknownQueryReferenceError);
    expect(() => declaredQueries(document)).toThrow("Load 'profiles' references undeclared query 'feed'");
  });

  it('rejects a body expression reading an undeclared query', () => {
    const document = parseDocument({
      body: [Nodes.vstack([Nodes.component('Avatar', { name: '{queries.people[0].name}' })])],
    });

    expect(() => declaredQueries(document)).toThrow(
      "Expression 'queries.people[0].name' references undeclared query 'people'"
    );
  });
});

describe('queryReferences', () => {
  it('finds every query an expression reads', () => {
    expect(queryReferences('.queries.feed | length')).toEqual(['feed']);
    expect(queryReferences('queries.a + queries.b')).toEqual(['a', 'b']);
    expect(queryReferences('state.queries.feed')).toEqual([]);
    expect(queryReferences('note.content')).toEqual([]);
  });
});

describe('bodyExpressions', () => {
  it('walks branches, expansions and component props in order', () => {
    const body = [
      Nodes.if('state.open', [Nodes.expr('state.title')], [Nodes.json('queries.feed')]),
      Nodes.each('queries.feed', 'n', [Nodes.component('Card', { title: '{n.title}', size: 'large' })]),
    ];

    expect(bodyExpressions(body)).toEqual(['state.open', 'state.title', 'queries.feed', 'queries.feed', 'n.title']);
  });
});
