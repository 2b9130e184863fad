import picomatch from 'picomatch';

import type { CapabilityGrant, CapabilityKind } from './types.js';

/** Targets matching `patterns` are refused unless they also match one of `except`. */
export interface DenyRule {
  patterns: string[];
  except: string[];
}

/**
 * A kind plus the path scopes it is limited to. Every scope must match a target for the
 * call to be permitted; no scopes means the kind is unrestricted. Deny rules are checked
 * first and any one of them refuses the target.
 */
export interface ResolvedGrant {
  kind: CapabilityKind;
  scopes: string[][];
  deny?: DenyRule[];
}

type Matcher = (target: string) => boolean;

interface CompiledGrant {
  kind: CapabilityKind;
  scopes: readonly (readonly string[])[];
  deny: readonly DenyRule[];
  matchers: readonly Matcher[];
  denied: readonly Matcher[];
}

/**
 * Immutable set of operation kinds. Grants narrowed along a delegation chain accumulate
 * scopes, so a child can never reach a path one of its delegators could not.
 */
export class CapabilitySet {
  private readonly byKind: ReadonlyMap<CapabilityKind, CompiledGrant>;

  private constructor(grants: Iterable<ResolvedGrant>) {
    const byKind = new Map<CapabilityKind, CompiledGrant>();
    for (const g of grants) {
      const scopes = g.scopes.map((s) => Object.freeze([...s]));
      const deny = dedupeRules(g.deny ?? []).map((r) =>
        Object.freeze({ patterns: [...r.patterns], except: [...r.except] })
      );
      byKind.set(
        g.kind,
        Object.freeze({
          kind: g.kind,
          scopes: Object.freeze(scopes),
          deny: Object.freeze(deny),
          matchers: Object.freeze(scopes.map((s) => picomatch([...s], { dot: true }))),
          denied: Object.freeze(deny.map(compileDenyRule))
        })
      );
    }
    this.byKind = byKind;
    Object.freeze(this);
  }

  /**
   * Builds a set from configuration. Repeated scoped grants for one kind widen each other;
   * an unrestricted grant for a kind wins over scoped ones. Deny rules of every grant for a
   * kind apply.
   */
  static of(entries: Iterable<CapabilityGrant | CapabilityKind>): CapabilitySet {
    const paths = new Map<CapabilityKind, string[] | null>();
    const deny = new Map<CapabilityKind, DenyRule[]>();
    for (const e of entries) {
      const g: CapabilityGrant = typeof e === 'string' ? { kind: e } : e;
      if (g.deny) deny.set(g.kind, [...(deny.get(g.kind) ?? []), { patterns: g.deny, except: g.allow ?? [] }]);
      const existing = paths.get(g.kind);
      if (existing === null) continue;
      if (!g.paths) {
        paths.set(g.kind, null);
        continue;
      }
      paths.set(g.kind, Array.from(new Set([...(existing ?? []), ...g.paths])));
    }
    return new CapabilitySet(
      Array.from(paths, ([kind, p]) => ({ kind, scopes: p ? [p] : [], deny: deny.get(kind) ?? [] }))
    );
  }

  static empty(): CapabilitySet {
    return new CapabilitySet([]);
  }

  get size(): number {
    return this.byKind.size;
  }

  has(kind: CapabilityKind): boolean {
    return this.byKind.has(kind);
  }

  /**
   * A scoped grant requires `target`. Without scopes a call with no target is permitted;
   * one with a target is still held against the deny rules.
   */
  permits(kind: CapabilityKind, target?: string): boolean {
    const g = this.byKind.get(kind);
    if (!g) return false;
    if (target === undefined) return g.matchers.length === 0;
    const normalized = normalizeTarget(target);
    if (g.denied.some((d) => d(normalized))) return false;
    return g.matchers.every((m) => m(normalized));
  }

  kinds(): CapabilityKind[] {
    return Array.from(this.byKind.keys());
  }

  grants(): ResolvedGrant[] {
    return Array.from(this.byKind.values(), copyGrant);
  }

  grant(kind: CapabilityKind): ResolvedGrant | undefined {
    const g = this.byKind.get(kind);
    return g ? copyGrant(g) : undefined;
  }

  /** Kinds in `requested` that this set does not hold. */
  missing(requested: Iterable<CapabilityKind>): CapabilityKind[] {
    const out: CapabilityKind[] = [];
    for (const k of requested) if (!this.has(k) && !out.includes(k)) out.push(k);
    return out;
  }

  /** Keeps only `kinds`, scopes and deny rules unchanged. */
  narrow(kinds: Iterable<CapabilityKind>): CapabilitySet {
    const keep = new Set(kinds);
    return new CapabilitySet(this.grants().filter((g) => keep.has(g.kind)));
  }

  /** Kinds held by both sets, limited by the scopes and deny rules of both. */
  intersect(other: CapabilitySet): CapabilitySet {
    const out: ResolvedGrant[] = [];
    for (const g of this.grants()) {
      const o = other.grant(g.kind);
      if (!o) continue;
      out.push({
        kind: g.kind,
        scopes: dedupeScopes([...g.scopes, ...o.scopes]),
        deny: [...(g.deny ?? []), ...(o.deny ?? [])]
      });
    }
    return new CapabilitySet(out);
  }

  isSubsetOf(other: CapabilitySet): boolean {
    return other.missing(this.kinds()).length === 0;
  }

  toJSON(): ResolvedGrant[] {
    return this.grants();
  }

  toString(): string {
    return this.grants()
      .map((g) => {
        const limits = g.scopes.map((s) => s.join(' | '));
        for (const r of g.deny ?? []) {
          limits.push(`not ${r.patterns.join(' | ')}${r.except.length ? ` unless ${r.except.join(' | ')}` : ''}`);
        }
        return limits.length ? `${g.kind}(${limits.join(' & ')})` : g.kind;
      })
      .join(', ');
  }
}

/** `deny` is left out when the grant has no deny rules. */
function copyGrant(g: CompiledGrant): ResolvedGrant {
  const out: ResolvedGrant = { kind: g.kind, scopes: g.scopes.map((s) => [...s]) };
  if (g.deny.length) out.deny = g.deny.map((r) => ({ patterns: [...r.patterns], except: [...r.except] }));
  return out;
}

function compileDenyRule(rule: DenyRule): Matcher {
  const denied = globMatcher(rule.patterns);
  const excepted = rule.except.length ? globMatcher(rule.except) : undefined;
  return (target) => denied(target) && !excepted?.(target);
}

/** Patterns without a slash also match the last segment of a target. */
function globMatcher(patterns: string[]): Matcher {
  const full = picomatch(patterns, { dot: true });
  const bare = patterns.filter((p) => !p.includes('/'));
  const base = bare.length ? picomatch(bare, { dot: true }) : undefined;
  return (target) => full(target) || (base?.(target.slice(target.lastIndexOf('/') + 1)) ?? false);
}

function dedupeRules(rules: DenyRule[]): DenyRule[] {
  const seen = new Set<string>();
  return rules.filter((r) => {
    const key = JSON.stringify([[...r.patterns].sort(), [...r.except].sort()]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function dedupeScopes(scopes: string[][]): string[][] {
  const seen = new Set<string>();
  const out: string[][] = [];
  for (const s of scopes) {
    const key = [...s].sort().join('\u0000');
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(s);
  }
  return out;
}

function normalizeTarget(target: string): string {
  return target.replaceAll('\\', '/').replace(/^\.\//, '');
}
