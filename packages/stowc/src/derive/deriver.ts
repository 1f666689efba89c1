/**
 * Derive orchestration
 *
 * Derives a type's storage layout in stages (classify, check collections,
 * resolve hints, generate codec and accessors), deriving every referenced
 * type first. Each type's progress is recorded in the registry so that
 * dependents reuse a success and report a failure with their own frames.
 */

import { createAccessor } from "#accessors";
import { LayoutError, ErrorCode, ErrorMessages } from "#checker";
import { Classifier, infiniteLayout } from "#classifier";
import {
  CodecError,
  CodecErrorCode,
  enumCodec,
  structCodec,
  type Codec,
} from "#codec";
import { inlineFields, resolveHints, type Hint } from "#hints";
import { ROOT_KEY, type StorageKey } from "#keys";
import { Packedness, Type, Types, type Declarations } from "#types";
import { Result } from "#result";
import { logger } from "#debug";

import type { Derived } from "./derived.js";
import { Registry, State } from "./registry.js";

export interface DeriveOptions {
  /** Key of the root cell of top-level layouts; defaults to `ROOT_KEY` */
  rootKey?: StorageKey;
  /** Hashing prefix of `storage_map` entries */
  storageMapPrefix?: string;
}

export class Deriver {
  readonly registry: Registry;
  private readonly classifier: Classifier;

  constructor(
    private readonly declarations: Declarations,
    private readonly options: DeriveOptions = {},
    registry: Registry = new Registry(),
  ) {
    this.registry = registry;
    this.classifier = new Classifier((name) =>
      Result.map(this.derive(name), (derived) => derived.packedness),
    );
  }

  /**
   * Derives every declaration in declaration order, reporting all failures
   */
  deriveAll(): Result<Derived[], LayoutError> {
    const errors: LayoutError[] = [];
    for (const name of this.declarations.keys()) {
      const result = this.derive(name);
      if (!result.success) {
        errors.push(...Result.errors(result));
      }
    }

    if (errors.length > 0) {
      return Result.err(errors);
    }
    return Result.ok(this.registry.resolved());
  }

  derive(name: string): Result<Derived, LayoutError> {
    const entry = this.registry.get(name);

    if (entry?.state === State.Resolved) {
      return Result.ok(entry.derived);
    }
    if (entry?.state === State.Rejected) {
      return Result.err(entry.errors);
    }
    if (entry) {
      // still in progress further up the derivation
      return Result.err(this.cycle(name));
    }

    const type = this.declarations.get(name);
    if (!type) {
      return Result.err(
        new LayoutError(
          ErrorCode.MISSING_CODEC_SUPPORT,
          ErrorMessages.UNKNOWN_TYPE(name),
        ),
      );
    }

    // Failures are recorded in the registry and reported through the fields
    // that use them
    for (const dependency of this.dependencies(name)) {
      if (dependency !== name) {
        this.derive(dependency);
      }
    }

    logger.derive("deriving %s", name);
    this.registry.advance(name, { state: State.Classifying, type });

    const classified = this.classifier.classify(type);
    if (!classified.success) {
      return this.reject(type, Result.errors(classified));
    }

    const packedness = classified.value;
    this.registry.advance(name, { state: State.Classified, type, packedness });
    this.registry.advance(name, { state: State.Resolving, type, packedness });

    const key = this.options.rootKey ?? ROOT_KEY;
    const hintsAt = (at: StorageKey) =>
      resolveHints(type, at, {
        packedness: (fieldType) => this.packedness(fieldType),
        lookup: (reference) => this.declarations.get(reference),
      });

    const hints = hintsAt(key);
    if (!hints.success) {
      return this.reject(type, Result.errors(hints));
    }

    const derived: Derived = {
      name,
      type,
      packedness,
      key,
      hints: hints.value,
      codec: this.codec(type, hints.value),
      hintsAt,
      accessor: (store, at = key) =>
        createAccessor(derived, store, at, {
          lookup: (reference) => this.registry.derived(reference),
          storageMapPrefix: this.options.storageMapPrefix,
        }),
    };

    this.registry.advance(name, { state: State.Resolved, type, derived });
    logger.derive(
      "%s is %s with %d hint(s)",
      name,
      packedness,
      hints.value.length,
    );
    return Result.ok(derived);
  }

  /**
   * Underived declarations reachable from `name` that lie on no cycle,
   * dependencies first. Walks the reference graph with an explicit stack
   * (Tarjan's algorithm), so long chains of references are derived
   * bottom-up instead of by nested calls.
   */
  private dependencies(name: string): string[] {
    const targets = (from: string): string[] => {
      const type = this.declarations.get(from);
      if (!type) {
        return [];
      }
      return Types.references(type).filter(
        (reference) =>
          this.declarations.has(reference) &&
          this.registry.state(reference) === State.Undeclared,
      );
    };

    const indices = new Map<string, number>();
    const stack: string[] = [];
    const onStack = new Set<string>();
    const frames: {
      node: string;
      index: number;
      low: number;
      targets: string[];
      next: number;
    }[] = [];
    const order: string[] = [];

    const enter = (node: string) => {
      const index = indices.size;
      indices.set(node, index);
      stack.push(node);
      onStack.add(node);
      frames.push({ node, index, low: index, targets: targets(node), next: 0 });
    };

    enter(name);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];

      if (frame.next < frame.targets.length) {
        const target = frame.targets[frame.next++];
        const seen = indices.get(target);
        if (seen === undefined) {
          enter(target);
        } else if (onStack.has(target)) {
          frame.low = Math.min(frame.low, seen);
        }
        continue;
      }

      frames.pop();
      if (frame.low === frame.index) {
        const component = stack.splice(stack.lastIndexOf(frame.node));
        for (const member of component) {
          onStack.delete(member);
        }
        if (component.length === 1 && !frame.targets.includes(frame.node)) {
          order.push(frame.node);
        }
      }

      const parent = frames[frames.length - 1];
      if (parent) {
        parent.low = Math.min(parent.low, frame.low);
      }
    }

    return order;
  }

  private codec(type: Type.Composite, hints: Hint[]): Codec {
    const resolve = (name: string): Codec => {
      const derived = this.registry.derived(name);
      if (!derived) {
        throw new CodecError(
          CodecErrorCode.NOT_INLINE,
          `\`${name}\` has no resolved codec`,
        );
      }
      return derived.codec;
    };

    if (Type.isStruct(type)) {
      return structCodec(type, inlineFields(hints), resolve);
    }
    return enumCodec(type, (variant) => inlineFields(hints, variant), resolve);
  }

  /**
   * Packedness of a field type of a type that classified successfully
   */
  private packedness(type: Type): Packedness {
    const result = this.classifier.classify(type);
    if (!result.success) {
      throw new Error(`\`${type.toString()}\` was not classified`);
    }
    return result.value;
  }

  private reject(
    type: Type.Composite,
    errors: LayoutError[],
  ): Result<Derived, LayoutError> {
    logger.error("rejected %s: %d error(s)", type.name, errors.length);
    this.registry.advance(type.name, {
      state: State.Rejected,
      type,
      errors,
    });
    return Result.err(errors);
  }

  private cycle(name: string): LayoutError {
    const stack = this.classifier.classifying;
    const start = stack.indexOf(name);
    const cycle = start === -1 ? [name, name] : [...stack.slice(start), name];
    return infiniteLayout(name, cycle);
  }
}
