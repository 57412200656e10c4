import {
  CyclicConstraintError,
  DuplicateNameError,
  FrozenRegistryError,
  UnknownAnchorError,
} from '../../src/core/errors';
import { Registry } from '../../src/core/registry';

function names(registry: Registry<string>): string[] {
  return registry.resolveNames();
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe('Registry - ordering', () => {
  it('should order unanchored entries by ascending priority', () => {
    const registry = new Registry<string>('test');
    registry.register('slow', 'slow', { priority: 30 });
    registry.register('fast', 'fast', { priority: 10 });
    registry.register('middle', 'middle', { priority: 20 });
    expect(names(registry)).toEqual(['fast', 'middle', 'slow']);
  });

  it('should keep insertion order for equal priorities', () => {
    const registry = new Registry<string>('test');
    registry.register('a', 'a');
    registry.register('b', 'b');
    registry.register('c', 'c');
    expect(names(registry)).toEqual(['a', 'b', 'c']);
  });

  it('should return items in resolved order', () => {
    const registry = new Registry<string>('test');
    registry.register('x', 'item-x', { priority: 2 });
    registry.register('y', 'item-y', { priority: 1 });
    expect(registry.resolveOrder()).toEqual(['item-y', 'item-x']);
  });

  it('should put prepended entries first, newest first', () => {
    const registry = new Registry<string>('test');
    registry.register('body', 'body', { priority: 0 });
    registry.register('first', 'first', { anchor: 'prepend' });
    registry.register('second', 'second', { anchor: 'prepend' });
    expect(names(registry)).toEqual(['second', 'first', 'body']);
  });

  it('should put appended entries last, in insertion order', () => {
    const registry = new Registry<string>('test');
    registry.register('tail-1', 'tail-1', { anchor: 'append' });
    registry.register('tail-2', 'tail-2', { anchor: 'append' });
    registry.register('body', 'body', { priority: 1000 });
    expect(names(registry)).toEqual(['body', 'tail-1', 'tail-2']);
  });

  it('should never sort a prepended entry after an earlier appended one', () => {
    const registry = new Registry<string>('test');
    registry.register('tail', 'tail', { anchor: 'append', priority: -100 });
    registry.register('head', 'head', { anchor: 'prepend', priority: 1000 });
    const order = names(registry);
    expect(order.indexOf('head')).toBeLessThan(order.indexOf('tail'));
  });

  it('should place before/after entries next to their anchor', () => {
    const registry = new Registry<string>('test');
    registry.register('a', 'a', { priority: 10 });
    registry.register('c', 'c', { priority: 30 });
    registry.register('b', 'b', { anchor: { before: 'c' }, priority: 500 });
    registry.register('d', 'd', { anchor: { after: 'a' }, priority: 0 });
    expect(names(registry)).toEqual(['a', 'd', 'b', 'c']);
  });

  it('should put anchored entries in the group of their anchor', () => {
    const registry = new Registry<string>('test');
    registry.register('body', 'body');
    registry.register('tail', 'tail', { anchor: 'append' });
    registry.register('after-tail', 'after-tail', { anchor: { after: 'tail' } });
    registry.register('head', 'head', { anchor: 'prepend' });
    registry.register('before-head', 'before-head', { anchor: { before: 'head' } });
    expect(names(registry)).toEqual(['before-head', 'head', 'body', 'tail', 'after-tail']);
  });

  it('should produce a total order containing every entry once', () => {
    const registry = new Registry<string>('test');
    registry.register('p', 'p', { priority: 5 });
    registry.register('q', 'q', { anchor: 'prepend' });
    registry.register('r', 'r', { anchor: { after: 'p' } });
    registry.register('s', 's', { anchor: 'append' });
    registry.register('t', 't', { anchor: { before: 'q' } });
    const order = names(registry);
    expect(order).toHaveLength(5);
    expect(new Set(order).size).toBe(5);
    expect(order).toEqual(['t', 'q', 'p', 'r', 's']);
  });
});

// ---------------------------------------------------------------------------
// Lookup and removal
// ---------------------------------------------------------------------------

describe('Registry - lookup', () => {
  it('should report membership and size', () => {
    const registry = new Registry<number>('numbers');
    registry.register('one', 1);
    expect(registry.has('one')).toBe(true);
    expect(registry.has('two')).toBe(false);
    expect(registry.get('one')).toBe(1);
    expect(registry.get('two')).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  it('should unregister entries', () => {
    const registry = new Registry<string>('test');
    registry.register('a', 'a');
    registry.register('b', 'b');
    expect(registry.unregister('a')).toBe(true);
    expect(registry.unregister('missing')).toBe(false);
    expect(names(registry)).toEqual(['b']);
  });

  it('should keep an entry in place when its anchor is removed', () => {
    const registry = new Registry<string>('test');
    registry.register('anchor', 'anchor', { anchor: 'append' });
    registry.register('follower', 'follower', { anchor: { after: 'anchor' } });
    registry.register('body', 'body');
    registry.unregister('anchor');
    expect(names(registry)).toEqual(['follower', 'body']);
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('Registry - errors', () => {
  it('should reject duplicate names', () => {
    const registry = new Registry<string>('inline rules');
    registry.register('a', 'a');
    expect(() => registry.register('a', 'again')).toThrow(DuplicateNameError);
    expect(() => registry.register('a', 'again')).toThrow('"a" is already registered in inline rules');
  });

  it('should reject anchors naming missing entries', () => {
    const registry = new Registry<string>('test');
    expect(() => registry.register('a', 'a', { anchor: { before: 'ghost' } })).toThrow(
      UnknownAnchorError,
    );
    expect(registry.has('a')).toBe(false);
  });

  it('should detect cycles created by re-registering an anchor', () => {
    const registry = new Registry<string>('test');
    registry.register('a', 'a');
    registry.register('b', 'b', { anchor: { after: 'a' } });
    registry.unregister('a');
    registry.register('a', 'a', { anchor: { after: 'b' } });

    let error: unknown;
    try {
      registry.resolveOrder();
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(CyclicConstraintError);
    if (error instanceof CyclicConstraintError) {
      expect(error.cycle).toEqual(['a', 'b', 'a']);
      expect(error.message).toBe('Ordering constraints in test form a cycle: a -> b -> a');
    }
  });

  it('should reject changes after freeze', () => {
    const registry = new Registry<string>('block syntaxes');
    registry.register('a', 'a');
    registry.freeze();
    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register('b', 'b')).toThrow(FrozenRegistryError);
    expect(() => registry.unregister('a')).toThrow(FrozenRegistryError);
    expect(names(registry)).toEqual(['a']);
  });
});
