import { RecursionLimitError } from '../../src/core/errors';
import { InlineScanner } from '../../src/core/inline-scanner';
import { element, text } from '../../src/core/nodes';
import { patternRule, wrapRule } from '../../src/core/rules';
import { DELETE_RE, SUBSCRIPT_RE } from '../../src/extensions/tilde';

const del = wrapRule('del', DELETE_RE, 'del', { conflicts: ['sub'] });
const sub = wrapRule('sub', SUBSCRIPT_RE, 'sub', { conflicts: ['del'] });

// ---------------------------------------------------------------------------
// Match selection
// ---------------------------------------------------------------------------

describe('InlineScanner - match selection', () => {
  it('should return plain text when nothing matches', () => {
    const scanner = new InlineScanner([del, sub]);
    expect(scanner.scan('just text')).toEqual([text('just text')]);
  });

  it('should return no nodes for empty input', () => {
    expect(new InlineScanner([del]).scan('')).toEqual([]);
  });

  it('should turn ~~strike~~ into a single del node', () => {
    const scanner = new InlineScanner([del, sub]);
    expect(scanner.scan('~~strike~~')).toEqual([element('del', {}, [text('strike')])]);
  });

  it('should keep ~~strike~~ a single del node when sub comes first', () => {
    const scanner = new InlineScanner([sub, del]);
    expect(scanner.scan('~~strike~~')).toEqual([element('del', {}, [text('strike')])]);
  });

  it('should prefer the earliest start over registry order', () => {
    const scanner = new InlineScanner([del, sub]);
    expect(scanner.scan('H~2~O and ~~gone~~')).toEqual([
      text('H'),
      element('sub', {}, [text('2')]),
      text('O and '),
      element('del', {}, [text('gone')]),
    ]);
  });

  it('should let a rule earlier in order win at the same offset', () => {
    const word = patternRule('word', /\bhello\b/, () => ({ nodes: [element('b', {}, [text('W')])] }));
    const greeting = patternRule('greeting', /\bhello world\b/, () => ({
      nodes: [element('i', {}, [text('G')])],
    }));
    expect(new InlineScanner([word, greeting]).scan('hello world')).toEqual([
      element('b', {}, [text('W')]),
      text(' world'),
    ]);
    expect(new InlineScanner([greeting, word]).scan('hello world')).toEqual([
      element('i', {}, [text('G')]),
    ]);
  });

  it('should look further along when a handler declines a match', () => {
    const even = patternRule('even', /\d/, (match) =>
      Number(match.groups[0]) % 2 === 0 ? { nodes: [element('em', {}, [text(match.groups[0])])] } : null,
    );
    expect(new InlineScanner([even]).scan('1 2 3')).toEqual([
      text('1 '),
      element('em', {}, [text('2')]),
      text(' 3'),
    ]);
  });

  it('should resume at the end a handler reports', () => {
    const eat = patternRule('eat', /@/, (match) => ({ nodes: [element('x')], end: match.end + 2 }));
    expect(new InlineScanner([eat]).scan('a@bcd')).toEqual([text('a'), element('x'), text('d')]);
  });
});

// ---------------------------------------------------------------------------
// Nesting and conflicts
// ---------------------------------------------------------------------------

describe('InlineScanner - nesting', () => {
  it('should scan nested content', () => {
    const scanner = new InlineScanner([del, sub]);
    expect(scanner.scan('~~a H~2~O~~')).toEqual([
      element('del', {}, [text('a H~2~O')]),
    ]);
  });

  it('should enable non-conflicting rules inside a span', () => {
    const mark = wrapRule('mark', /==(.+?)==/, 'mark');
    const scanner = new InlineScanner([del, mark]);
    expect(scanner.scan('~~x ==y== z~~')).toEqual([
      element('del', {}, [text('x '), element('mark', {}, [text('y')]), text(' z')]),
    ]);
  });

  it('should fall back to literal text past the recursion limit', () => {
    const paren = wrapRule('paren', /\((.*)\)/, 'span');
    const scanner = new InlineScanner([paren], { maxDepth: 2 });
    const warnings: string[] = [];
    expect(scanner.scan('((((a))))', warnings)).toEqual([
      element('span', {}, [element('span', {}, [element('span', {}, [text('(a)')])])]),
    ]);
    expect(warnings).toEqual(['Inline nesting exceeded the maximum depth of 2']);
  });

  it('should reject a scan that starts beyond the limit', () => {
    const scanner = new InlineScanner([], { maxDepth: 1 });
    expect(() =>
      scanner.scanWithState('x', { depth: 2, disabled: new Set(), warn: () => undefined }),
    ).toThrow(RecursionLimitError);
  });

  it('should pass the nesting depth to handlers', () => {
    const depths: number[] = [];
    const paren = patternRule('paren', /\((.*)\)/, (match, context) => {
      depths.push(context.depth);
      return { nodes: context.scanNested(match.groups[1]) };
    });
    new InlineScanner([paren]).scan('((x))');
    expect(depths).toEqual([0, 1]);
  });
});

// ---------------------------------------------------------------------------
// Helpers used by the marked bridge
// ---------------------------------------------------------------------------

describe('InlineScanner - bridge helpers', () => {
  const state = { depth: 0, disabled: new Set<string>(), warn: () => undefined };

  it('should only accept matches at offset 0 in matchAt', () => {
    const scanner = new InlineScanner([del]);
    expect(scanner.matchAt('a ~~b~~', state)).toBeNull();
    expect(scanner.matchAt('~~b~~ c', state)).toEqual({
      nodes: [element('del', {}, [text('b')])],
      end: 5,
    });
  });

  it('should report the earliest enabled match from firstMatchOffset', () => {
    const scanner = new InlineScanner([del, sub]);
    expect(scanner.firstMatchOffset('abc ~x~ ~~y~~')).toBe(4);
    expect(scanner.firstMatchOffset('abc ~x~ ~~y~~', new Set(['sub']))).toBe(8);
    expect(scanner.firstMatchOffset('plain')).toBe(-1);
  });
});
