/**
 * Ordered registry of named pipeline entries.
 *
 * Inline rules, block syntaxes, preprocessors and postprocessor passes are
 * all kept in a {@link Registry}. Entries fall into three groups: those
 * anchored at the head (`prepend`), the unanchored middle, and those
 * anchored at the tail (`append`). An entry anchored `before`/`after`
 * another joins that entry's group. Within a group, entries are ordered by
 * their anchor edges first, then by ascending priority, then by insertion
 * order (newest first for `prepend`).
 *
 * Registries are mutated only during setup. {@link Registry.freeze} makes
 * them read-only so converters can be shared.
 *
 * @module core/registry
 */
import {
  CyclicConstraintError,
  DuplicateNameError,
  FrozenRegistryError,
  UnknownAnchorError,
} from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('registry');

/** Where an entry is placed relative to the rest of the registry. */
export type Anchor = 'append' | 'prepend' | { before: string } | { after: string };

export interface RegisterOptions {
  /** Lower values run first. @default 100 */
  priority?: number;
  anchor?: Anchor;
}

export const DEFAULT_PRIORITY = 100;

interface Entry<T> {
  name: string;
  item: T;
  priority: number;
  anchor?: Anchor;
  seq: number;
}

type Group = 0 | 1 | 2;

export class Registry<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private seq = 0;
  private frozen = false;
  private resolved: Entry<T>[] | null = null;

  /**
   * @param label - Human-readable name used in error messages.
   */
  constructor(public readonly label: string) {}

  /**
   * Add an entry under a unique name.
   *
   * @throws {@link DuplicateNameError} when `name` is taken.
   * @throws {@link UnknownAnchorError} when the anchor names a missing entry.
   * @throws {@link FrozenRegistryError} after {@link freeze}.
   */
  register(name: string, item: T, options: RegisterOptions = {}): void {
    this.assertMutable();
    if (this.entries.has(name)) {
      throw new DuplicateNameError(this.label, name);
    }
    const { anchor } = options;
    const target = anchorTarget(anchor);
    if (target !== undefined && !this.entries.has(target)) {
      throw new UnknownAnchorError(this.label, target);
    }

    this.entries.set(name, {
      name,
      item,
      priority: options.priority ?? DEFAULT_PRIORITY,
      anchor,
      seq: this.seq++,
    });
    this.resolved = null;
    log('%s: registered %s', this.label, name);
  }

  /**
   * Remove an entry. Entries anchored to it fall back to the middle group
   * until an entry of that name is registered again.
   */
  unregister(name: string): boolean {
    this.assertMutable();
    const removed = this.entries.delete(name);
    if (removed) {
      this.resolved = null;
    }
    return removed;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): T | undefined {
    return this.entries.get(name)?.item;
  }

  get size(): number {
    return this.entries.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Resolve the order once and reject further changes.
   */
  freeze(): void {
    this.resolveEntries();
    this.frozen = true;
  }

  /**
   * Return the items as one strictly ordered sequence.
   *
   * @throws {@link CyclicConstraintError} when the anchors form a cycle.
   */
  resolveOrder(): T[] {
    return this.resolveEntries().map((entry) => entry.item);
  }

  /** Names in resolved order. */
  resolveNames(): string[] {
    return this.resolveEntries().map((entry) => entry.name);
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new FrozenRegistryError(this.label);
    }
  }

  private resolveEntries(): Entry<T>[] {
    if (this.resolved) {
      return this.resolved;
    }

    const byGroup: [Entry<T>[], Entry<T>[], Entry<T>[]] = [[], [], []];
    for (const entry of this.entries.values()) {
      byGroup[this.groupOf(entry, new Set())].push(entry);
    }

    const ordered = [
      ...this.sortGroup(byGroup[0], true),
      ...this.sortGroup(byGroup[1], false),
      ...this.sortGroup(byGroup[2], false),
    ];
    this.resolved = ordered;
    return ordered;
  }

  private groupOf(entry: Entry<T>, seen: Set<string>): Group {
    const { anchor } = entry;
    if (anchor === 'prepend') return 0;
    if (anchor === 'append') return 2;
    const target = anchorTarget(anchor);
    if (target === undefined || seen.has(entry.name)) return 1;
    const anchored = this.entries.get(target);
    if (!anchored) return 1;
    seen.add(entry.name);
    return this.groupOf(anchored, seen);
  }

  /**
   * Kahn's algorithm over the before/after edges of one group, always
   * taking the ready entry with the lowest (priority, sequence) key.
   */
  private sortGroup(group: Entry<T>[], newestFirst: boolean): Entry<T>[] {
    const members = new Set(group.map((entry) => entry.name));
    const successors = new Map<string, string[]>();
    const indegree = new Map<string, number>();
    for (const entry of group) {
      successors.set(entry.name, []);
      indegree.set(entry.name, 0);
    }

    const addEdge = (from: string, to: string): void => {
      successors.get(from)?.push(to);
      indegree.set(to, (indegree.get(to) ?? 0) + 1);
    };

    for (const entry of group) {
      const { anchor } = entry;
      if (typeof anchor !== 'object') continue;
      if ('before' in anchor && members.has(anchor.before)) {
        addEdge(entry.name, anchor.before);
      } else if ('after' in anchor && members.has(anchor.after)) {
        addEdge(anchor.after, entry.name);
      }
    }

    const key = (entry: Entry<T>): [number, number] => [
      entry.priority,
      newestFirst ? -entry.seq : entry.seq,
    ];
    const compare = (a: Entry<T>, b: Entry<T>): number => {
      const [pa, sa] = key(a);
      const [pb, sb] = key(b);
      return pa !== pb ? pa - pb : sa - sb;
    };

    const ready = group.filter((entry) => indegree.get(entry.name) === 0);
    const result: Entry<T>[] = [];
    while (ready.length > 0) {
      ready.sort(compare);
      const next = ready.shift();
      if (!next) break;
      result.push(next);
      for (const name of successors.get(next.name) ?? []) {
        const remaining = (indegree.get(name) ?? 0) - 1;
        indegree.set(name, remaining);
        if (remaining === 0) {
          const entry = this.entries.get(name);
          if (entry) ready.push(entry);
        }
      }
    }

    if (result.length !== group.length) {
      const placed = new Set(result.map((entry) => entry.name));
      const stuck = group.filter((entry) => !placed.has(entry.name));
      throw new CyclicConstraintError(this.label, findCycle(stuck, successors));
    }
    return result;
  }
}

function anchorTarget(anchor: Anchor | undefined): string | undefined {
  if (anchor === undefined || typeof anchor === 'string') return undefined;
  return 'before' in anchor ? anchor.before : anchor.after;
}

/**
 * Every entry left over by the topological sort still has an unplaced
 * predecessor, so walking predecessors must eventually repeat a name.
 */
function findCycle<T>(stuck: Entry<T>[], successors: Map<string, string[]>): string[] {
  const names = new Set(stuck.map((entry) => entry.name));
  const predecessor = new Map<string, string>();
  for (const from of names) {
    for (const to of successors.get(from) ?? []) {
      if (names.has(to) && !predecessor.has(to)) {
        predecessor.set(to, from);
      }
    }
  }

  const path: string[] = [];
  let current: string | undefined = stuck[0]?.name;
  while (current !== undefined && !path.includes(current)) {
    path.push(current);
    current = predecessor.get(current);
  }
  if (current === undefined) return path.reverse();
  const cycle = path.slice(path.indexOf(current)).reverse();
  return [...cycle, cycle[0]];
}
