import { buildDescriptor, type EnumDescriptor } from '../core/descriptor.js';
import { describeKind, isIntegralKind } from '../core/kinds.js';
import { typeId as toTypeId, type TypeId } from '../core/type-id.js';
import {
  DescriptorNotFoundError,
  InvalidRegistryConfigError,
  TypeIdCollisionError,
} from '../errors/errors.js';
import type {
  CollisionPolicy,
  DescriptorOptions,
  DescriptorSource,
  IntegralKind,
  RawMember,
  RegistryConfig,
} from '../types/types.js';

const COLLISION_POLICIES: readonly CollisionPolicy[] = ['error', 'warn', 'allow'];

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function' ? () => maybePerf.now() : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for the build hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

/**
 * Describe how a candidate registration differs from the cached descriptor.
 * An empty list means the two are interchangeable.
 */
function diffDescriptor(existing: EnumDescriptor, candidate: EnumDescriptor): string[] {
  const diffs: string[] = [];
  if (existing.kind.width !== candidate.kind.width || existing.kind.signed !== candidate.kind.signed) {
    diffs.push(`kind ${describeKind(existing.kind)} → ${describeKind(candidate.kind)}`);
  }
  if (existing.flags !== candidate.flags) {
    diffs.push(`flags ${String(existing.flags)} → ${String(candidate.flags)}`);
  }
  const count = Math.max(existing.members.length, candidate.members.length);
  for (let i = 0; i < count; i++) {
    const a = existing.members[i];
    const b = candidate.members[i];
    if (a && b && a.name === b.name && a.value === b.value) continue;
    const before = a ? `${a.name} = ${a.value}` : '(none)';
    const after = b ? `${b.name} = ${b.value}` : '(none)';
    diffs.push(`member #${i}: ${before} → ${after}`);
  }
  return diffs;
}

/**
 * Process-lifetime cache of enum descriptors, keyed by type id.
 *
 * Entries are added once and never evicted or replaced: the number of
 * symbolic types in a program is finite, and every reader of a type id must
 * see the same descriptor. Registries are plain objects; create one per
 * application (or per test) and pass it where it is needed, or use
 * `DescriptorRegistry.shared()` for the process-wide default.
 *
 * Population:
 * - register(): eager, host supplies the members
 * - getOrBuild(): lazy, the source is only evaluated on first use
 *
 * Lookup is a single Map read. JavaScript runs a build to completion before
 * any other code sees the registry, so the first finished build is the only
 * one ever published for a type id.
 */
export class DescriptorRegistry {
  readonly name: string;
  private readonly collisionPolicy: CollisionPolicy;
  private readonly buildHook?: (typeId: TypeId, durationNs: number) => void;
  private readonly descriptors = new Map<TypeId, EnumDescriptor>();

  constructor(config: RegistryConfig = {}) {
    const policy = config.collisionPolicy ?? 'error';
    if (!COLLISION_POLICIES.includes(policy)) {
      throw new InvalidRegistryConfigError(
        `'collisionPolicy' must be one of ${COLLISION_POLICIES.join(', ')}.`
      );
    }
    if (config.onBuild !== undefined && typeof config.onBuild !== 'function') {
      throw new InvalidRegistryConfigError(`'onBuild' must be a function.`);
    }
    this.name = config.name ?? 'default';
    this.collisionPolicy = policy;
    this.buildHook = config.onBuild;
  }

  /**
   * Process-wide default registry, created on first use.
   *
   * Lives on globalThis so a bundle that loads this module twice still shares
   * one cache.
   */
  static shared(): DescriptorRegistry {
    return (globalThis.__FLAGMARK_REGISTRY__ ??= new DescriptorRegistry({ name: 'shared' }));
  }

  /**
   * Register a symbolic type eagerly.
   *
   * Registering the same members again returns the cached descriptor. A
   * different set of members is handled by the collision policy; the first
   * descriptor is kept in every case.
   *
   * @throws DescriptorBuildError subclasses when the members are invalid
   * @throws TypeIdCollisionError under the 'error' policy
   */
  register(
    id: TypeId | string,
    members: readonly RawMember[],
    kind: IntegralKind,
    options: DescriptorOptions = {}
  ): EnumDescriptor {
    const key = toTypeId(id);
    const candidate = this.build(key, { members, kind, flags: options.flags });
    const existing = this.descriptors.get(key);
    if (!existing) {
      this.descriptors.set(key, candidate);
      return candidate;
    }
    this.checkCollision(existing, candidate);
    return existing;
  }

  /**
   * Return the cached descriptor, building it from `source()` on first use.
   *
   * `source` is not called when the type is already registered.
   */
  getOrBuild(id: TypeId | string, source: () => DescriptorSource): EnumDescriptor {
    const key = toTypeId(id);
    const cached = this.descriptors.get(key);
    if (cached) return cached;
    const built = this.build(key, source());
    this.descriptors.set(key, built);
    return built;
  }

  get(id: TypeId | string): EnumDescriptor | undefined {
    return this.descriptors.get(toTypeId(id));
  }

  /**
   * @throws DescriptorNotFoundError when the type was never registered
   */
  require(id: TypeId | string): EnumDescriptor {
    const key = toTypeId(id);
    const descriptor = this.descriptors.get(key);
    if (!descriptor) throw new DescriptorNotFoundError(key, this.name, this.typeIds());
    return descriptor;
  }

  has(id: TypeId | string): boolean {
    return this.descriptors.has(toTypeId(id));
  }

  /** Registered type ids, in registration order. */
  typeIds(): TypeId[] {
    return Array.from(this.descriptors.keys());
  }

  get size(): number {
    return this.descriptors.size;
  }

  // ---- internals ----

  private build(key: TypeId, source: DescriptorSource): EnumDescriptor {
    if (!isIntegralKind(source.kind)) {
      throw new InvalidRegistryConfigError(`'${key}' has an invalid integral kind.`);
    }
    const hook = this.buildHook;
    if (!hook) return buildDescriptor(key, source.members, source.kind, { flags: source.flags });

    const start = nowMs();
    const descriptor = buildDescriptor(key, source.members, source.kind, { flags: source.flags });
    hook(key, toNs(nowMs() - start));
    return descriptor;
  }

  private checkCollision(existing: EnumDescriptor, candidate: EnumDescriptor): void {
    const differences = diffDescriptor(existing, candidate);
    if (differences.length === 0 || this.collisionPolicy === 'allow') return;

    if (this.collisionPolicy === 'warn') {
      console.warn(
        `[Flagmark] '${existing.typeId}' registered again in registry '${this.name}' with different members; keeping the first registration:`
      );
      for (const d of differences) console.warn(`  - ${d}`);
      return;
    }

    throw new TypeIdCollisionError(existing.typeId, this.name, differences);
  }
}
