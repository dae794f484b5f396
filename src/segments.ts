/**
 * @fileoverview Registry of the Cargo home subtrees cached by this action.
 * Each segment is restored, fingerprinted and saved independently of the others.
 */

/**
 * Tag identifying one cacheable subtree.
 */
export type SegmentKind = 'indices' | 'crates-source' | 'vcs-checkouts';

/**
 * One exclusion rule: an entry named `name` found `depth` levels below the segment root.
 * Depth 1 addresses the immediate children of the root.
 */
export type IgnoreRule = readonly [depth: number, name: string];

/**
 * Exclusion policy for fingerprinting. Immutable once built.
 */
export class Ignores {
  private readonly rules: ReadonlyArray<{ readonly depth: number; readonly name: Buffer }>;

  constructor(rules: readonly IgnoreRule[] = []) {
    this.rules = rules.map(([depth, name]) => ({ depth, name: Buffer.from(name, 'utf8') }));
  }

  /**
   * Checks an entry name, given as the raw bytes read from the directory.
   */
  matches(depth: number, name: Buffer): boolean {
    return this.rules.some((rule) => rule.depth === depth && rule.name.equals(name));
  }
}

export type Segment = {
  readonly kind: SegmentKind;
  readonly shortName: string;
  readonly friendlyName: string;
  readonly relativePath: readonly string[];
  readonly ignores: Ignores;
};

const SEGMENTS: readonly Segment[] = [
  {
    kind: 'indices',
    shortName: 'indices',
    friendlyName: 'Registry indices',
    relativePath: ['registry', 'index'],
    // Cargo touches this marker on every index update check
    ignores: new Ignores([[1, '.last-updated']]),
  },
  {
    kind: 'crates-source',
    shortName: 'crates',
    friendlyName: 'Crate files',
    relativePath: ['registry', 'cache'],
    ignores: new Ignores(),
  },
  {
    kind: 'vcs-checkouts',
    shortName: 'git-repos',
    friendlyName: 'Git repositories',
    relativePath: ['git', 'db'],
    ignores: new Ignores(),
  },
];

/**
 * Returns every cacheable segment in registry order.
 */
export function allSegments(): readonly Segment[] {
  return SEGMENTS;
}

/**
 * Looks up a segment by the identifier users pass in the `cache-only` input.
 *
 * @param shortName - Segment identifier such as `indices`
 * @returns The matching segment, or undefined when the name is not recognized
 */
export function findSegmentByShortName(shortName: string): Segment | undefined {
  return SEGMENTS.find((segment) => segment.shortName === shortName);
}
