/**
 * Field Access Tracking.
 *
 * Records which fields application code actually reads on the records a
 * query group materialized. Records are observed through a Proxy that the
 * record layer hands out instead of the raw row.
 */

import { type RecordIdentity } from "../core/types";

// ============================================================
// Types
// ============================================================

export const UNKNOWN_SHAPE = "(unknown shape)";

/**
 * Snapshot of the reads observed on one materialized record.
 */
export type FieldAccessRecord = Readonly<{
  groupId: string;
  recordKey: string;
  shape: string;
  fields: ReadonlySet<string>;
  readCounts: ReadonlyMap<string, number>;
}>;

type MutableAccessRecord = {
  groupId: string;
  recordKey: string;
  shape: string;
  readCounts: Map<string, number>;
};

// ============================================================
// Constants
// ============================================================

const OBJECT_PROTOTYPE_PROPERTIES = new Set<string>([
  "__proto__",
  "constructor",
  "hasOwnProperty",
  "isPrototypeOf",
  "propertyIsEnumerable",
  "toLocaleString",
  "toString",
  "valueOf",
]);

// ============================================================
// FieldAccessTracker
// ============================================================

export class FieldAccessTracker {
  readonly #records = new Map<string, MutableAccessRecord>();
  readonly #index = new WeakMap<object, MutableAccessRecord>();
  readonly #objectKeys = new WeakMap<object, number>();
  #nextObjectKey = 1;

  /**
   * Registers a materialized record as produced by a group.
   * Registering the same record twice keeps the first registration.
   */
  track(groupId: string, identity: RecordIdentity): void {
    if (this.#index.has(identity.record)) return;

    const shape = identity.shape ?? UNKNOWN_SHAPE;
    const recordKey =
      identity.key === undefined ?
        `#${this.#objectKeyFor(identity.record)}`
      : `${shape}:${String(identity.key)}`;
    const mapKey = `${groupId}\u0000${recordKey}`;

    // Two rows with the same key in one group are one record.
    const existing = this.#records.get(mapKey);
    if (existing) {
      this.#index.set(identity.record, existing);
      return;
    }

    const record: MutableAccessRecord = {
      groupId,
      recordKey,
      shape,
      readCounts: new Map(),
    };
    this.#records.set(mapKey, record);
    this.#index.set(identity.record, record);
  }

  /**
   * Makes `alias` (usually the Proxy) resolve to the same record as `record`.
   */
  alias(record: object, alias: object): void {
    const entry = this.#index.get(record);
    if (entry) {
      this.#index.set(alias, entry);
    }
  }

  isTracked(record: object): boolean {
    return this.#index.has(record);
  }

  groupOf(record: object): string | undefined {
    return this.#index.get(record)?.groupId;
  }

  /**
   * Records one read. Returns false when the record was never registered.
   */
  record(record: object, field: string): boolean {
    const entry = this.#index.get(record);
    if (!entry) return false;
    entry.readCounts.set(field, (entry.readCounts.get(field) ?? 0) + 1);
    return true;
  }

  getRecords(): readonly FieldAccessRecord[] {
    return [...this.#records.values()].map((entry) => ({
      groupId: entry.groupId,
      recordKey: entry.recordKey,
      shape: entry.shape,
      fields: new Set(entry.readCounts.keys()),
      readCounts: new Map(entry.readCounts),
    }));
  }

  #objectKeyFor(record: object): number {
    const existing = this.#objectKeys.get(record);
    if (existing !== undefined) return existing;
    const key = this.#nextObjectKey++;
    this.#objectKeys.set(record, key);
    return key;
  }
}

// ============================================================
// Record Proxy
// ============================================================

/**
 * Wraps a record so that reads of its data fields are reported.
 *
 * Symbols, Object prototype members and function-valued properties
 * (methods) are passed through without being reported. Accessors run with
 * the raw record as `this` so private fields keep working.
 *
 * @example
 * ```typescript
 * const row = createTrackingProxy({ id: 1, name: "Ada" }, (field) => {
 *   reads.push(field);
 * });
 * row.name; // reads === ["name"]
 * ```
 */
export function createTrackingProxy<T extends object>(
  record: T,
  onRead: (field: string) => void,
): T {
  return new Proxy(record, {
    get(target, property) {
      const value: unknown = Reflect.get(target, property, target);

      if (typeof property === "symbol") return value;
      if (OBJECT_PROTOTYPE_PROPERTIES.has(property)) return value;
      if (!(property in target)) return value;
      if (typeof value === "function") return value;

      onRead(property);
      return value;
    },
  });
}
