// ─── Converter Registry ──────────────────────────────────────────────────────
//
// Directed graph of conversions between pitch types. Each edge holds a
// pipeline of single-hop converters: an explicit edge has one step, an
// implicit edge chains several (Spelled → Enharmonic → LogFreq).
// ─────────────────────────────────────────────────────────────────────────────

import type { AnyValue, AnyValueType, ValueType } from "../core/value.js";
import { typeName, type TypeTag } from "../core/tags.js";
import {
  ConversionConsistencyError,
  ConversionNotFoundError,
  ConverterExistsError,
  InvalidConverterError,
  RegistryFrozenError,
} from "../errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type Converter = (value: AnyValue) => AnyValue;

export interface RegisterOptions {
  /** Replace an existing single-step converter. */
  overwriteExplicit?: boolean;
  /** Replace an existing chained converter. */
  overwriteImplicit?: boolean;
  /** Chain the new converter onto every edge that starts at `to` or ends at `from`. */
  createImplicit?: boolean;
}

export interface ConverterStats {
  types: number;
  converters: number;
  explicit: number;
  implicit: number;
}

export interface ConverterEdge {
  readonly from: AnyValueType;
  readonly to: AnyValueType;
  readonly pipeline: readonly Converter[];
}

// ─── Registry ────────────────────────────────────────────────────────────────

export class ConverterRegistry {
  private readonly edges = new Map<string, Map<string, ConverterEdge>>();
  private frozen = false;

  /**
   * Register a converter from one type to another.
   * Throws if an edge exists and the matching overwrite flag is not set.
   */
  register<F extends AnyValue, T extends AnyValue>(
    from: ValueType<F>,
    to: ValueType<T>,
    convert: (value: F) => T,
    options: RegisterOptions = {},
  ): void {
    const fromName = typeName(from);
    const toName = typeName(to);

    if (this.frozen) {
      throw new RegistryFrozenError(fromName, toName);
    }
    if (fromName === toName) {
      throw new InvalidConverterError(`Cannot register a converter from ${fromName} to itself`);
    }

    const existing = this.edges.get(fromName)?.get(toName);
    if (existing) {
      const implicit = existing.pipeline.length > 1;
      const allowed = implicit ? options.overwriteImplicit : options.overwriteExplicit;
      if (!allowed) {
        throw new ConverterExistsError(fromName, toName, implicit);
      }
    }

    const step: Converter = (value) => {
      if (!(value instanceof from)) {
        throw new ConversionConsistencyError(`Converter from ${fromName} to ${toName} received ${value.typeName}`);
      }
      return convert(value);
    };

    this.setEdge({ from, to, pipeline: [step] });
    if (options.createImplicit) {
      this.extend(from, to, step);
    }
  }

  /** The converter pipeline from one type to another. */
  getConverter(from: TypeTag, to: TypeTag): readonly Converter[] {
    const edge = this.edges.get(typeName(from))?.get(typeName(to));
    if (!edge) {
      throw new ConversionNotFoundError(typeName(from), typeName(to));
    }
    return edge.pipeline;
  }

  /** Every type that values of `from` can be converted to. */
  targetsOf(from: TypeTag): AnyValueType[] {
    return [...(this.edges.get(typeName(from))?.values() ?? [])].map((edge) => edge.to);
  }

  /**
   * Convert `value` to the target type. Returns `value` itself when it
   * already has that type.
   */
  convert<T extends AnyValue>(value: AnyValue, to: ValueType<T>): T {
    if (value instanceof to) return value;

    const result = this.getConverter(value, to).reduce<AnyValue>((current, step) => step(current), value);
    if (!(result instanceof to)) {
      throw new ConversionConsistencyError(
        `Converting ${value.typeName} to ${typeName(to)} produced ${result.typeName}`,
      );
    }
    if (result.isPitch !== value.isPitch || result.isClass !== value.isClass) {
      throw new ConversionConsistencyError(
        `Converting ${value.typeName} to ${result.typeName} changed its pitch/interval or class kind`,
      );
    }
    return result;
  }

  /** Reject all further registrations. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** All edges, in registration order. */
  entries(): ConverterEdge[] {
    return [...this.edges.values()].flatMap((targets) => [...targets.values()]);
  }

  describe(): ConverterStats {
    const all = this.entries();
    const types = new Set(all.flatMap((edge) => [typeName(edge.from), typeName(edge.to)]));
    const explicit = all.filter((edge) => edge.pipeline.length === 1).length;
    return {
      types: types.size,
      converters: all.length,
      explicit,
      implicit: all.length - explicit,
    };
  }

  private setEdge(edge: ConverterEdge): void {
    const fromName = typeName(edge.from);
    let targets = this.edges.get(fromName);
    if (!targets) {
      targets = new Map();
      this.edges.set(fromName, targets);
    }
    targets.set(typeName(edge.to), edge);
  }

  private hasEdge(from: TypeTag, to: TypeTag): boolean {
    return this.edges.get(typeName(from))?.has(typeName(to)) ?? false;
  }

  // Never replaces an existing edge and never creates a self-edge.
  private extend(from: AnyValueType, to: AnyValueType, step: Converter): void {
    const fromName = typeName(from);
    const toName = typeName(to);
    const added: ConverterEdge[] = [];

    for (const edge of this.entries()) {
      const source = typeName(edge.from);
      const target = typeName(edge.to);

      if (source === toName && target !== fromName && !this.hasEdge(from, edge.to)) {
        added.push({ from, to: edge.to, pipeline: [step, ...edge.pipeline] });
      }
      if (target === fromName && source !== toName && !this.hasEdge(edge.from, to)) {
        added.push({ from: edge.from, to, pipeline: [...edge.pipeline, step] });
      }
    }

    for (const edge of added) {
      if (!this.hasEdge(edge.from, edge.to)) this.setEdge(edge);
    }
  }
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Check that every edge joins two types of the same kind.
 * Throws listing every bad edge; logs a summary line otherwise.
 */
export function validateRegistry(registry: ConverterRegistry): void {
  const errors = registry
    .entries()
    .filter((edge) => edge.from.kind !== edge.to.kind)
    .map((edge) => `${typeName(edge.from)} → ${typeName(edge.to)} changes ${edge.from.kind} to ${edge.to.kind}`);

  if (errors.length > 0) {
    throw new ConversionConsistencyError(`Invalid converter registry:\n  - ${errors.join("\n  - ")}`);
  }

  const stats = registry.describe();
  console.error(
    `Converter registry valid: ${stats.converters} converters (${stats.explicit} explicit, ${stats.implicit} implicit) across ${stats.types} types.`,
  );
}

/** Registry used by convertTo() when none is passed. */
export const defaultRegistry = new ConverterRegistry();
