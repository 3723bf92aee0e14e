/**
 * GroupingEngine - clusters query events into logical access operations.
 *
 * A group is one primary query plus the dependent queries fired while
 * resolving relationships on the records it produced. Membership is decided
 * when a query starts, so completion order never moves a query between
 * groups.
 */

import { type Origin, type QueryEvent, type QueryRole } from "../core/types";
import { formatOrigin } from "../correlator/origin-resolver";

// ============================================================
// QueryGroup
// ============================================================

export class QueryGroup {
  readonly id: string;
  readonly sequence: number;
  readonly origin: Origin;
  #primary: QueryEvent | undefined;
  readonly #dependents: QueryEvent[] = [];
  #open = true;

  constructor(sequence: number, origin: Origin) {
    this.sequence = sequence;
    this.origin = origin;
    this.id = `${formatOrigin(origin)}#${sequence}`;
  }

  get primary(): QueryEvent | undefined {
    return this.#primary;
  }

  /**
   * Dependents ordered by start (query sequence ids follow start order).
   */
  get dependents(): readonly QueryEvent[] {
    return this.#dependents.toSorted((a, b) => a.id - b.id);
  }

  get hasEvents(): boolean {
    return this.#primary !== undefined || this.#dependents.length > 0;
  }

  get isOpen(): boolean {
    return this.#open;
  }

  attach(event: QueryEvent): void {
    if (event.role === "primary") {
      this.#primary = event;
      return;
    }
    this.#dependents.push(event);
  }

  close(): void {
    this.#open = false;
  }
}

// ============================================================
// Relationship Scopes
// ============================================================

/**
 * Handle for an open relationship-resolution scope.
 */
export type RelationshipScope = Readonly<{
  id: number;
  relation?: string;
}>;

type MutableScope = {
  id: number;
  relation?: string;
  groupId: string | undefined;
};

export type GroupAssignment = Readonly<{
  group: QueryGroup;
  role: QueryRole;
}>;

// ============================================================
// GroupingEngine
// ============================================================

/**
 * @example
 * ```typescript
 * const grouping = new GroupingEngine();
 *
 * const books = grouping.assignGroup(origin);            // primary of group 1
 * const scope = grouping.openScope(books.group.id);
 * const authors = grouping.assignGroup(origin);          // dependent of group 1
 * grouping.closeScope(scope);
 * ```
 */
export class GroupingEngine {
  readonly #groups: QueryGroup[] = [];
  readonly #byId = new Map<string, QueryGroup>();
  /** Groups not yet closed, in creation order */
  readonly #open = new Set<QueryGroup>();
  readonly #scopes: MutableScope[] = [];
  #nextGroupSequence = 1;
  #nextScopeId = 1;

  /**
   * Decides the group of a query that is about to run.
   *
   * Inside a relationship scope the query is a dependent of the innermost
   * scope's group. Outside any scope it opens a new group as its primary,
   * which closes every group no active scope still holds.
   */
  assignGroup(origin: Origin): GroupAssignment {
    const scope = this.#scopes.at(-1);
    if (scope?.groupId !== undefined) {
      const group = this.#byId.get(scope.groupId);
      if (group) {
        return { group, role: "dependent" };
      }
    }

    const group = this.#openGroup(origin);
    if (scope) {
      // The first query of an unanchored scope anchors it.
      scope.groupId = group.id;
    }
    return { group, role: "primary" };
  }

  /**
   * Opens a relationship-resolution scope.
   *
   * @param sourceGroupId - Group that produced the records whose relationship
   *   is being resolved, when known
   * @param anchored - Whether the caller identified its source records. An
   *   identified source whose group has closed does not fall back to the
   *   most recent open group.
   */
  openScope(
    sourceGroupId: string | undefined,
    options: Readonly<{ relation?: string; anchored?: boolean }> = {},
  ): RelationshipScope {
    const groupId = this.#resolveScopeTarget(
      sourceGroupId,
      options.anchored ?? sourceGroupId !== undefined,
    );
    const scope: MutableScope = {
      id: this.#nextScopeId++,
      groupId,
      ...(options.relation !== undefined && { relation: options.relation }),
    };
    this.#scopes.push(scope);
    return {
      id: scope.id,
      ...(scope.relation !== undefined && { relation: scope.relation }),
    };
  }

  /**
   * Closes a scope. Returns false if it was not open.
   */
  closeScope(scope: RelationshipScope): boolean {
    const index = this.#scopes.findIndex((open) => open.id === scope.id);
    if (index === -1) return false;
    this.#scopes.splice(index, 1);
    return true;
  }

  get openGroupCount(): number {
    return this.#open.size;
  }

  get openScopeCount(): number {
    return this.#scopes.length;
  }

  getGroup(groupId: string): QueryGroup | undefined {
    return this.#byId.get(groupId);
  }

  /**
   * Groups in creation order, which is the start order of their primaries.
   */
  getGroups(): readonly QueryGroup[] {
    return [...this.#groups];
  }

  /**
   * Closes every group and drops all scopes. Called at unit-of-work end.
   */
  closeAll(): void {
    for (const group of this.#open) {
      group.close();
    }
    this.#open.clear();
    this.#scopes.length = 0;
  }

  #resolveScopeTarget(
    sourceGroupId: string | undefined,
    anchored: boolean,
  ): string | undefined {
    if (sourceGroupId !== undefined) {
      const source = this.#byId.get(sourceGroupId);
      if (source?.isOpen) {
        return source.id;
      }
    }

    // Nearest enclosing scope wins over arrival order.
    const enclosing = this.#scopes.findLast(
      (scope) => scope.groupId !== undefined,
    );
    if (enclosing) {
      return enclosing.groupId;
    }

    if (anchored) {
      return undefined;
    }
    let latest: QueryGroup | undefined;
    for (const group of this.#open) {
      latest = group;
    }
    return latest?.id;
  }

  #openGroup(origin: Origin): QueryGroup {
    const pinned = new Set(
      this.#scopes
        .map((scope) => scope.groupId)
        .filter((groupId) => groupId !== undefined),
    );
    // Only groups a scope still holds stay open.
    for (const group of this.#open) {
      if (!pinned.has(group.id)) {
        group.close();
        this.#open.delete(group);
      }
    }

    const group = new QueryGroup(this.#nextGroupSequence++, origin);
    this.#groups.push(group);
    this.#byId.set(group.id, group);
    this.#open.add(group);
    return group;
  }
}
