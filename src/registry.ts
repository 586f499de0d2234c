/**
 * fixwire — tag registry
 *
 * Immutable mapping from tag number to TagDescriptor. The default registry is
 * built once at module load from tags.json and never modified; every
 * descriptor is frozen, so a registry can be shared by any number of parses.
 *
 * lookup() is total: a tag missing from the table resolves to UNKNOWN_TAG
 * ('int', no special property). That silently types genuinely unknown fields
 * as integers; use isUnknownTag() where the distinction matters.
 */

import tagTable from './tags.json';
import type { SemanticType, TagDescriptor, TagLookup, TagProperty } from './types';

// ─── Type Guards ──────────────────────────────────────────────────────────────

const SEMANTIC_TYPES: ReadonlySet<string> = new Set<SemanticType>([
  'int', 'float', 'char', 'boolean', 'data', 'string', 'date', 'time',
]);

const TAG_PROPERTIES: ReadonlySet<string> = new Set<TagProperty>([
  'none', 'repeated', 'data-length', 'data', 'encoded', 'multi-value-string',
]);

function isSemanticType(value: string): value is SemanticType {
  return SEMANTIC_TYPES.has(value);
}

function isTagProperty(value: string): value is TagProperty {
  return TAG_PROPERTIES.has(value);
}

// ─── Sentinel ─────────────────────────────────────────────────────────────────

export const UNKNOWN_TAG: TagDescriptor = Object.freeze({
  key:          0,
  name:         'Unknown',
  semanticType: 'int',
  property:     'none',
});

export function isUnknownTag(descriptor: TagDescriptor): boolean {
  return descriptor === UNKNOWN_TAG;
}

/**
 * True for tags whose value is a length-prefixed, delimiter-opaque payload:
 * the tokenizer must skip exactly the declared byte count instead of
 * scanning for SOH.
 */
export function isRawDataTag(descriptor: TagDescriptor): boolean {
  return descriptor.property === 'data' || descriptor.property === 'encoded';
}

// ─── Registry ─────────────────────────────────────────────────────────────────

/** One row of a tag table, as read from JSON. */
export interface TagTableEntry {
  readonly key:          number;
  readonly name:         string;
  readonly semanticType: string;
  readonly property?:    string;
}

export class TagRegistry implements TagLookup, Iterable<TagDescriptor> {
  private readonly byKey: ReadonlyMap<number, TagDescriptor>;

  /** @internal — use createTagRegistry() */
  constructor(descriptors: readonly TagDescriptor[]) {
    this.byKey = new Map(descriptors.map(d => [d.key, d]));
  }

  lookup(tagNumber: number): TagDescriptor {
    return this.byKey.get(tagNumber) ?? UNKNOWN_TAG;
  }

  has(tagNumber: number): boolean {
    return this.byKey.has(tagNumber);
  }

  get size(): number {
    return this.byKey.size;
  }

  [Symbol.iterator](): Iterator<TagDescriptor> {
    return this.byKey.values();
  }
}

/**
 * Build a frozen registry from table rows.
 *
 * Throws TypeError on a malformed table: non-positive or non-integer key,
 * duplicate key, unknown semantic type or property. This runs at
 * construction time only; lookups never fail.
 */
export function createTagRegistry(entries: readonly TagTableEntry[]): TagRegistry {
  const seen = new Set<number>();
  const descriptors: TagDescriptor[] = [];

  for (const entry of entries) {
    if (!Number.isInteger(entry.key) || entry.key <= 0) {
      throw new TypeError(`createTagRegistry: invalid tag key ${entry.key} for '${entry.name}'.`);
    }
    if (seen.has(entry.key)) {
      throw new TypeError(`createTagRegistry: duplicate tag key ${entry.key} ('${entry.name}').`);
    }
    seen.add(entry.key);

    const semanticType = entry.semanticType;
    if (!isSemanticType(semanticType)) {
      throw new TypeError(
        `createTagRegistry: tag ${entry.key} has unknown semantic type '${semanticType}'.`,
      );
    }
    const property = entry.property ?? 'none';
    if (!isTagProperty(property)) {
      throw new TypeError(
        `createTagRegistry: tag ${entry.key} has unknown property '${property}'.`,
      );
    }

    descriptors.push(Object.freeze({ key: entry.key, name: entry.name, semanticType, property }));
  }

  return new TagRegistry(descriptors);
}

/** FIX 4.4 tags known to the library. */
export const defaultRegistry: TagRegistry = createTagRegistry(tagTable);
