/**
 * QueryLens engine tests: unit-of-work lifecycle, capture hooks, field
 * reads and the ways instrumentation degrades instead of failing.
 */
import { describe, expect, it } from "vitest";

import { InstrumentationFailure } from "../src/errors";
import { at, createTestLens, VIEW_FILE } from "./test-utils";

// ============================================================
// Lifecycle
// ============================================================

describe("unit of work lifecycle", () => {
  it("registers one unit of work per context", () => {
    const { lens } = createTestLens();

    const first = lens.beginUnitOfWork("req-1");
    lens.beginUnitOfWork("req-2");

    expect(lens.activeCount).toBe(2);
    expect(lens.getActiveUnitOfWork("req-1")).toBe(first);

    const report = lens.endUnitOfWork("req-1");
    expect(report.unitOfWorkId).toBe("uow-1");
    expect(report.contextId).toBe("req-1");
    expect(lens.activeCount).toBe(1);
    expect(lens.getActiveUnitOfWork("req-1")).toBeUndefined();
    expect(first.state).toBe("closed");
  });

  it("keeps the active unit of work on a nested begin", () => {
    const { lens, log } = createTestLens();

    const outer = lens.beginUnitOfWork("req-1");
    const inner = lens.beginUnitOfWork("req-1");
    const report = lens.endUnitOfWork("req-1");

    const message =
      'beginUnitOfWork("req-1") called while a unit of work is already active for this context.';
    expect(inner).toBe(outer);
    expect(report.warnings).toEqual([
      { kind: "nested-begin", contextId: "req-1", message },
    ]);
    expect(log.map((entry) => entry.message)).toEqual([
      `[QueryLens] ${message}`,
    ]);
  });

  it("returns an empty report for an end without a begin", () => {
    const { lens } = createTestLens();

    const report = lens.endUnitOfWork("req-9");

    expect(report.groups).toEqual([]);
    expect(report.summary).toEqual({
      totalQueries: 0,
      totalDbTimeMs: 0,
      totalExecutionTimeMs: undefined,
      duplicates: [],
    });
    expect(report.warnings).toEqual([
      {
        kind: "unmatched-end",
        contextId: "req-9",
        message:
          'endUnitOfWork("req-9") called without a matching beginUnitOfWork.',
      },
    ]);
  });

  it("measures execution time on the monotonic clock", () => {
    const { lens, clock } = createTestLens();

    lens.beginUnitOfWork("req-1");
    clock.advance(5);
    const token = lens.onQueryStart("req-1", "SELECT 1", { origin: at(3) });
    clock.advance(3);
    const event = lens.onQueryEnd(token, { columns: ["1"], rowCount: 1 });
    clock.advance(2);
    const report = lens.endUnitOfWork("req-1");

    expect(event).toEqual({
      id: 1,
      statement: "SELECT 1",
      columns: ["1"],
      startedAtMs: 5,
      durationMs: 3,
      origin: at(3),
      groupId: `${VIEW_FILE}:3#1`,
      role: "primary",
      rowCount: 1,
      failed: false,
      completed: true,
    });
    expect(Object.isFrozen(event)).toBe(true);
    expect(report.summary.totalDbTimeMs).toBe(3);
    expect(report.summary.totalExecutionTimeMs).toBe(10);
  });
});

// ============================================================
// Capture
// ============================================================

describe("query capture", () => {
  it("ignores hooks for contexts without a unit of work", () => {
    const { lens, log } = createTestLens();

    const token = lens.onQueryStart("req-1", "SELECT 1");

    expect(token).toBeUndefined();
    expect(lens.onQueryEnd(token)).toBeUndefined();
    expect(lens.wrapRecord("req-1", "g#1", { id: 1 })).toEqual({ id: 1 });
    lens.onFieldRead("req-1", {}, "id");
    expect(log).toEqual([]);
  });

  it("records queries still running at the end as incomplete", () => {
    const { lens } = createTestLens();

    lens.beginUnitOfWork("req-1");
    const token = lens.onQueryStart("req-1", "SELECT * FROM books", {
      origin: at(8),
    });
    const report = lens.endUnitOfWork("req-1");

    const primary = report.groups[0]?.primary;
    expect(primary?.completed).toBe(false);
    expect(primary?.durationMs).toBeUndefined();
    expect(report.warnings).toEqual([
      {
        kind: "incomplete-query",
        contextId: "req-1",
        message: "Query 1 had not completed when the unit of work ended.",
        statement: "SELECT * FROM books",
      },
    ]);
    // The late end hook finds nothing to complete.
    expect(lens.onQueryEnd(token)).toBeUndefined();
  });

  it("drops a token that belongs to an earlier unit of work", () => {
    const { lens } = createTestLens();

    lens.beginUnitOfWork("req-1");
    const stale = lens.onQueryStart("req-1", "SELECT 1", { origin: at(1) });
    lens.endUnitOfWork("req-1");

    lens.beginUnitOfWork("req-1");
    expect(lens.onQueryEnd(stale)).toBeUndefined();
    expect(lens.endUnitOfWork("req-1").summary.totalQueries).toBe(0);
  });

  it("degrades timing when the clock fails", () => {
    let calls = 0;
    const { lens, log } = createTestLens({
      clock: () => {
        calls++;
        if (calls === 2) throw new Error("clock stopped");
        return calls === 3 ? Number.NaN : calls;
      },
    });

    lens.beginUnitOfWork("req-1"); // clock call 1
    const token = lens.onQueryStart("req-1", "SELECT 1", { origin: at(1) }); // throws
    const event = lens.onQueryEnd(token); // NaN

    expect(event?.startedAtMs).toBeUndefined();
    expect(event?.durationMs).toBeUndefined();
    expect(log.map((entry) => entry.message)).toEqual([
      "[QueryLens] Clock is unavailable.",
      "[QueryLens] Clock returned NaN.",
    ]);
    expect(log[0]?.details).toBeInstanceOf(InstrumentationFailure);
  });

  it("keeps bound parameters only when asked to", () => {
    const plain = createTestLens().lens;
    plain.beginUnitOfWork("req-1");
    const withoutParams = plain.onQueryEnd(
      plain.onQueryStart("req-1", "SELECT ?", { params: [1], origin: at(1) }),
    );

    const capturing = createTestLens({ captureParams: true }).lens;
    capturing.beginUnitOfWork("req-1");
    const withParams = capturing.onQueryEnd(
      capturing.onQueryStart("req-1", "SELECT ?", {
        params: [1],
        origin: at(1),
      }),
    );

    expect(withoutParams?.params).toBeUndefined();
    expect(withParams?.params).toEqual([1]);
  });

  it("marks failed driver calls and rethrows the driver error", () => {
    const { lens } = createTestLens();
    const failure = new Error("SQLITE_ERROR: no such table: missing");

    lens.beginUnitOfWork("req-1");
    expect(() =>
      lens.capture("req-1", "SELECT * FROM missing", () => {
        throw failure;
      }, { origin: at(4) }),
    ).toThrow(failure);
    const report = lens.endUnitOfWork("req-1");

    expect(report.groups[0]?.primary.failed).toBe(true);
    expect(report.groups[0]?.primary.completed).toBe(true);
  });

  it("describes results through the capture callback", async () => {
    const { lens, log } = createTestLens();

    lens.beginUnitOfWork("req-1");
    const { result, event } = await lens.captureAsync(
      "req-1",
      "SELECT id FROM authors",
      () => Promise.resolve([{ id: 1 }, { id: 2 }]),
      { origin: at(5), describe: (rows) => ({ rowCount: rows.length }) },
    );
    const broken = lens.capture("req-1", "SELECT 2", () => 2, {
      origin: at(6),
      describe: () => {
        throw new Error("describe failed");
      },
    });

    expect(result).toEqual([{ id: 1 }, { id: 2 }]);
    expect(event?.rowCount).toBe(2);
    expect(broken.result).toBe(2);
    expect(broken.event?.rowCount).toBeUndefined();
    expect(log.map((entry) => entry.message)).toEqual([
      "[QueryLens] Failed to describe a query result.",
    ]);
  });

  it("resolves the origin from the calling code when none is given", () => {
    const { lens } = createTestLens();

    lens.beginUnitOfWork("req-1");
    const event = lens.onQueryEnd(lens.onQueryStart("req-1", "SELECT 1"));

    expect(event?.origin.kind).toBe("resolved");
    if (event?.origin.kind !== "resolved") return;
    expect(event.origin.file.endsWith("query-lens.test.ts")).toBe(true);
  });
});

// ============================================================
// Field Reads
// ============================================================

describe("field reads", () => {
  it("attributes reads on wrapped records to their group", () => {
    const { lens } = createTestLens();

    lens.beginUnitOfWork("req-1");
    const event = lens.onQueryEnd(
      lens.onQueryStart("req-1", "SELECT id, name, bio FROM authors", {
        origin: at(12),
      }),
      { columns: ["id", "name", "bio"] },
    );
    const author = lens.wrapRecord(
      "req-1",
      event?.groupId ?? "",
      { id: 1, name: "Name 1", bio: "Bio 1" },
      { shape: "authors", key: 1 },
    );
    expect(author.name).toBe("Name 1");
    const report = lens.endUnitOfWork("req-1");

    const fields = report.groups[0]?.fields;
    expect(fields?.status).toBe("known");
    if (fields?.status !== "known") return;
    expect([...fields.overFetched]).toEqual(["id", "bio"]);
  });

  it("accepts explicit reads on tracked records", () => {
    const { lens } = createTestLens();

    lens.beginUnitOfWork("req-1");
    const event = lens.onQueryEnd(
      lens.onQueryStart("req-1", "SELECT id, name FROM authors", {
        origin: at(12),
      }),
      { columns: ["id", "name"] },
    );
    const row = { id: 1, name: "Name 1" };
    lens.trackRecord("req-1", event?.groupId ?? "", { record: row, key: 1 });
    lens.onFieldRead("req-1", row, "id");
    const report = lens.endUnitOfWork("req-1");

    expect(report.groups[0]?.fields.consumed).toEqual(new Set(["id"]));
  });

  it("logs reads on records no query produced", () => {
    const { lens, log } = createTestLens();

    lens.beginUnitOfWork("req-1");
    lens.onFieldRead("req-1", { id: 1 }, "id");

    expect(log.map((entry) => entry.message)).toEqual([
      '[QueryLens] Read of "id" on a record no tracked query produced.',
    ]);
  });

  it("refuses records for groups that have not recorded a query", () => {
    const { lens, log } = createTestLens();

    lens.beginUnitOfWork("req-1");
    lens.onQueryStart("req-1", "SELECT 1", { origin: at(1) });
    const groupId = `${VIEW_FILE}:1#1`;
    const row = { id: 1 };
    const wrapped = lens.wrapRecord("req-1", groupId, row);
    lens.trackRecord("req-1", "nowhere#1", { record: row });

    expect(wrapped).toBe(row);
    expect(log.map((entry) => entry.message)).toEqual([
      `[QueryLens] Record attributed to group "${groupId}", which has not recorded a query.`,
      '[QueryLens] Record attributed to group "nowhere#1", which has not recorded a query.',
    ]);
  });
});

// ============================================================
// Scoped Runs
// ============================================================

describe("asynchronous relationship resolution", () => {
  it("attributes awaited lookups to the source group", async () => {
    const { lens } = createTestLens();
    lens.beginUnitOfWork("req-1");
    const books = lens.onQueryEnd(
      lens.onQueryStart("req-1", "SELECT id, author_id FROM books", {
        origin: at(10),
      }),
      { columns: ["id", "author_id"] },
    );
    const groupId = books?.groupId ?? "";

    const author = await lens.resolveRelationshipAsync(
      "req-1",
      { groupId },
      async () => {
        await Promise.resolve();
        const token = lens.onQueryStart(
          "req-1",
          "SELECT name FROM authors WHERE id = ?",
          { origin: at(11) },
        );
        await Promise.resolve();
        return lens.onQueryEnd(token, { columns: ["name"] });
      },
    );

    expect(groupId).toBe(`${VIEW_FILE}:10#1`);
    expect(author?.role).toBe("dependent");
    expect(author?.groupId).toBe(groupId);
  });

  it("closes the scope when the lookup rejects", async () => {
    const { lens } = createTestLens();
    lens.beginUnitOfWork("req-1");
    const books = lens.onQueryEnd(
      lens.onQueryStart("req-1", "SELECT id FROM books", { origin: at(10) }),
    );
    const groupId = books?.groupId ?? "";

    await expect(
      lens.resolveRelationshipAsync("req-1", { groupId }, async () => {
        await Promise.resolve();
        throw new Error("lookup failed");
      }),
    ).rejects.toThrow("lookup failed");

    const next = lens.onQueryEnd(
      lens.onQueryStart("req-1", "SELECT id FROM books", { origin: at(20) }),
    );
    const report = lens.endUnitOfWork("req-1");

    expect(next?.role).toBe("primary");
    expect(next?.groupId).toBe(`${VIEW_FILE}:20#2`);
    expect(report.groups.map((group) => group.dependents.length)).toEqual([0, 0]);
  });
});

describe("runUnitOfWork", () => {
  it("runs the callback inside the execution context", async () => {
    const { lens } = createTestLens();

    const outcome = await lens.runUnitOfWork("req-1", async () => {
      await Promise.resolve();
      return lens.context.current();
    });

    expect(outcome.status).toBe("fulfilled");
    if (outcome.status !== "fulfilled") return;
    expect(outcome.value).toBe("req-1");
    expect(outcome.report.contextId).toBe("req-1");
    expect(lens.activeCount).toBe(0);
    expect(lens.context.current()).toBeUndefined();
  });

  it("releases the unit of work when the callback fails", async () => {
    const { lens } = createTestLens();
    const failure = new Error("handler failed");

    const outcome = await lens.runUnitOfWork("req-1", () => {
      lens.onQueryEnd(lens.onQueryStart("req-1", "SELECT 1", { origin: at(2) }));
      throw failure;
    });

    expect(outcome.status).toBe("rejected");
    if (outcome.status !== "rejected") return;
    expect(outcome.reason).toBe(failure);
    expect(outcome.report.summary.totalQueries).toBe(1);
    expect(lens.activeCount).toBe(0);
  });

  it("keeps concurrent contexts apart", async () => {
    const { lens } = createTestLens();

    const work = (contextId: string, statements: string[]) =>
      lens.runUnitOfWork(contextId, async () => {
        for (const statement of statements) {
          await Promise.resolve();
          const current = lens.context.current() ?? "";
          lens.onQueryEnd(
            lens.onQueryStart(current, statement, { origin: at(1) }),
          );
        }
      });

    const [a, b] = await Promise.all([
      work("req-a", ["SELECT 'a1'", "SELECT 'a2'"]),
      work("req-b", ["SELECT 'b1'"]),
    ]);

    expect(a.report.groups.map((group) => group.primary.statement)).toEqual([
      "SELECT 'a1'",
      "SELECT 'a2'",
    ]);
    expect(b.report.groups.map((group) => group.primary.statement)).toEqual([
      "SELECT 'b1'",
    ]);
  });

  it("leaves an outer unit of work running when nested in the same context", async () => {
    const { lens } = createTestLens();
    const query = (statement: string, line: number): void => {
      lens.onQueryEnd(lens.onQueryStart("req-1", statement, { origin: at(line) }));
    };

    const outer = await lens.runUnitOfWork("req-1", async () => {
      query("SELECT 1", 1);
      const inner = await lens.runUnitOfWork("req-1", () => {
        query("SELECT 2", 2);
        return "inner";
      });
      const stillActive = lens.activeCount;
      query("SELECT 3", 3);
      return { inner, stillActive };
    });

    const message =
      'beginUnitOfWork("req-1") called while a unit of work is already active for this context.';
    expect(outer.status).toBe("fulfilled");
    if (outer.status !== "fulfilled") return;
    const { inner, stillActive } = outer.value;

    expect(stillActive).toBe(1);
    expect(inner.status).toBe("fulfilled");
    expect(inner.report.unitOfWorkId).toBe("uow-1");
    expect(inner.report.summary.totalQueries).toBe(2);
    expect(inner.report.warnings).toEqual([
      { kind: "nested-begin", contextId: "req-1", message },
    ]);

    expect(outer.report.unitOfWorkId).toBe("uow-1");
    expect(outer.report.groups.map((group) => group.primary.statement)).toEqual([
      "SELECT 1",
      "SELECT 2",
      "SELECT 3",
    ]);
    expect(outer.report.warnings).toEqual([
      { kind: "nested-begin", contextId: "req-1", message },
    ]);
    expect(lens.activeCount).toBe(0);
  });
});

describe("abandoned units of work", () => {
  it("releases the unit of work when its signal aborts", () => {
    const { lens } = createTestLens();
    const controller = new AbortController();
    const reports: string[][] = [];

    lens.beginUnitOfWork("req-1", {
      signal: controller.signal,
      onAbandon: (report) => {
        reports.push(report.warnings.map((warning) => warning.kind));
      },
    });
    controller.abort();

    expect(lens.activeCount).toBe(0);
    expect(reports).toEqual([["abandoned"]]);
  });

  it("abandons immediately for an aborted signal", () => {
    const { lens } = createTestLens();

    const unitOfWork = lens.beginUnitOfWork("req-1", {
      signal: AbortSignal.abort(),
    });

    expect(unitOfWork.isActive).toBe(false);
    expect(lens.activeCount).toBe(0);
  });

  it("stops listening once the unit of work ends", () => {
    const { lens } = createTestLens();
    const controller = new AbortController();
    let abandoned = 0;

    lens.beginUnitOfWork("req-1", {
      signal: controller.signal,
      onAbandon: () => {
        abandoned++;
      },
    });
    lens.endUnitOfWork("req-1");
    lens.beginUnitOfWork("req-1");
    controller.abort();

    expect(abandoned).toBe(0);
    expect(lens.activeCount).toBe(1);
  });
});
