import { describe, expect, it } from "vitest";

import { UNATTRIBUTED } from "../src/core/types";
import { GroupingEngine } from "../src/grouping/grouping-engine";
import { at, VIEW_FILE } from "./test-utils";

describe("GroupingEngine", () => {
  it("opens a new group for every query outside a relationship scope", () => {
    const grouping = new GroupingEngine();

    const first = grouping.assignGroup(at(10));
    const second = grouping.assignGroup(at(10));

    expect(first.role).toBe("primary");
    expect(second.role).toBe("primary");
    expect(first.group.id).toBe(`${VIEW_FILE}:10#1`);
    expect(second.group.id).toBe(`${VIEW_FILE}:10#2`);
    expect(first.group.isOpen).toBe(false);
    expect(second.group.isOpen).toBe(true);
  });

  it("labels unattributed groups", () => {
    const grouping = new GroupingEngine();
    expect(grouping.assignGroup(UNATTRIBUTED).group.id).toBe("unattributed#1");
  });

  it("makes queries inside a scope dependents of the source group", () => {
    const grouping = new GroupingEngine();
    const books = grouping.assignGroup(at(10));

    const scope = grouping.openScope(books.group.id, { relation: "author" });
    const authors = grouping.assignGroup(at(11));
    const publishers = grouping.assignGroup(at(12));
    expect(grouping.closeScope(scope)).toBe(true);

    expect(authors).toEqual({ group: books.group, role: "dependent" });
    expect(publishers).toEqual({ group: books.group, role: "dependent" });
    expect(scope.relation).toBe("author");
  });

  it("reports closing an unknown scope", () => {
    const grouping = new GroupingEngine();
    const scope = grouping.openScope(undefined);
    expect(grouping.closeScope(scope)).toBe(true);
    expect(grouping.closeScope(scope)).toBe(false);
  });

  it("keeps a group open while a scope still holds it", () => {
    const grouping = new GroupingEngine();
    const books = grouping.assignGroup(at(10));
    const scope = grouping.openScope(books.group.id);

    grouping.assignGroup(at(11));
    expect(books.group.isOpen).toBe(true);

    grouping.closeScope(scope);
    const next = grouping.assignGroup(at(20));
    expect(next.role).toBe("primary");
    expect(books.group.isOpen).toBe(false);
  });

  it("uses the nearest enclosing scope for nested prefetches", () => {
    const grouping = new GroupingEngine();
    const books = grouping.assignGroup(at(10));

    const outer = grouping.openScope(books.group.id, { relation: "author" });
    // The nested relation names a source the engine does not know.
    const inner = grouping.openScope("elsewhere#9", { relation: "publisher" });
    const nested = grouping.assignGroup(at(30));
    grouping.closeScope(inner);
    grouping.closeScope(outer);

    expect(nested).toEqual({ group: books.group, role: "dependent" });
  });

  it("starts a new group when an identified source has closed", () => {
    const grouping = new GroupingEngine();
    const stale = grouping.assignGroup(at(10));
    const current = grouping.assignGroup(at(20));

    const scope = grouping.openScope(stale.group.id, { anchored: true });
    const query = grouping.assignGroup(at(21));
    grouping.closeScope(scope);

    expect(query.role).toBe("primary");
    expect(query.group).not.toBe(current.group);
    expect(query.group.id).toBe(`${VIEW_FILE}:21#3`);
  });

  it("attaches an unidentified scope to the most recent open group", () => {
    const grouping = new GroupingEngine();
    const books = grouping.assignGroup(at(10));

    const scope = grouping.openScope(undefined);
    const authors = grouping.assignGroup(at(11));
    grouping.closeScope(scope);

    expect(authors).toEqual({ group: books.group, role: "dependent" });
  });

  it("lets the first query anchor a scope that found no group", () => {
    const grouping = new GroupingEngine();

    const scope = grouping.openScope(undefined);
    const first = grouping.assignGroup(at(10));
    const second = grouping.assignGroup(at(11));
    grouping.closeScope(scope);

    expect(first.role).toBe("primary");
    expect(second).toEqual({ group: first.group, role: "dependent" });
  });

  it("orders dependents by query sequence", () => {
    const grouping = new GroupingEngine();
    const { group } = grouping.assignGroup(at(10));
    const base = {
      statement: "SELECT 1",
      columns: undefined,
      startedAtMs: 0,
      durationMs: 1,
      origin: at(10),
      groupId: group.id,
      failed: false,
      completed: true,
    };

    group.attach({ ...base, id: 3, role: "dependent" });
    group.attach({ ...base, id: 1, role: "primary" });
    group.attach({ ...base, id: 2, role: "dependent" });

    expect(group.primary?.id).toBe(1);
    expect(group.dependents.map((event) => event.id)).toEqual([2, 3]);
  });

  it("closes everything at the end", () => {
    const grouping = new GroupingEngine();
    const books = grouping.assignGroup(at(10));
    grouping.openScope(books.group.id);

    grouping.closeAll();

    expect(books.group.isOpen).toBe(false);
    expect(grouping.openScopeCount).toBe(0);
    expect(grouping.openGroupCount).toBe(0);
    expect(grouping.getGroups()).toEqual([books.group]);
    expect(grouping.getGroup(books.group.id)).toBe(books.group);
  });

  it("keeps a single group open across a long loop of primaries", () => {
    const grouping = new GroupingEngine();

    const openCounts = new Set<number>();
    for (let line = 1; line <= 5000; line++) {
      grouping.assignGroup(at(line));
      openCounts.add(grouping.openGroupCount);
    }

    expect([...openCounts]).toEqual([1]);
    expect(grouping.getGroups()).toHaveLength(5000);
    expect(grouping.getGroups().filter((group) => group.isOpen)).toHaveLength(1);
  });

  it("falls back to the latest open group for an unanchored scope", () => {
    const grouping = new GroupingEngine();
    grouping.assignGroup(at(10));
    const latest = grouping.assignGroup(at(20));

    const scope = grouping.openScope(undefined);
    const lookup = grouping.assignGroup(at(21));
    grouping.closeScope(scope);

    expect(lookup).toEqual({ group: latest.group, role: "dependent" });
    expect(grouping.openGroupCount).toBe(1);
  });
});
