/**
 * End-to-end attribution scenarios over an in-memory SQLite database.
 */
import { describe, expect, it } from "vitest";

import { instrumentSqlite } from "../src/integrations/sqlite";
import { at, createLibraryDatabase, createTestLens, VIEW_FILE } from "./test-utils";

type Author = { id: number; name: string; bio: string | null };
type Book = { id: number; title: string; summary: string | null; author_id: number };

function setup() {
  const { lens, clock } = createTestLens();
  const db = instrumentSqlite(createLibraryDatabase(), lens);
  return { lens, clock, db };
}

describe("attribution scenarios", () => {
  it("reports the fields a single query fetched but nobody read", async () => {
    const { lens, db } = setup();

    const { report } = await lens.runUnitOfWork("req-1", () => {
      const authors = db
        .prepare<[], Author>("SELECT id, name, bio FROM authors")
        .all();
      return authors.map((author) => author.name);
    });

    expect(report.groups).toHaveLength(1);
    expect(report.groups[0]?.fields).toEqual({
      status: "known",
      fetched: new Set(["id", "name", "bio"]),
      consumed: new Set(["name"]),
      overFetched: new Set(["id", "bio"]),
    });
  });

  it("groups a relationship query with its primary whatever the completion order", () => {
    const { lens } = createTestLens();

    lens.beginUnitOfWork("req-1");
    const books = lens.onQueryStart("req-1", "SELECT * FROM books", {
      origin: at(20),
    });
    const groupId = `${VIEW_FILE}:20#1`;

    const scope = lens.beginRelationship("req-1", {
      groupId,
      relation: "author",
    });
    const authors = lens.onQueryStart(
      "req-1",
      "SELECT * FROM authors WHERE id IN (1, 2)",
      { origin: at(21) },
    );
    lens.endRelationship(scope);

    // The dependent finishes first.
    lens.onQueryEnd(authors, { columns: ["id", "name", "bio"] });
    lens.onQueryEnd(books, { columns: ["id", "title", "summary", "author_id"] });
    const report = lens.endUnitOfWork("req-1");

    expect(report.groups).toHaveLength(1);
    const group = report.groups[0];
    expect(group?.id).toBe(groupId);
    expect(group?.primary.statement).toBe("SELECT * FROM books");
    expect(group?.dependents.map((event) => event.statement)).toEqual([
      "SELECT * FROM authors WHERE id IN (1, 2)",
    ]);
    expect(group?.dependents[0]?.groupId).toBe(groupId);
    expect(group?.dependents[0]?.role).toBe("dependent");
  });

  it("gives every loop iteration its own group at the same origin", async () => {
    const { lens, db } = setup();

    const { report } = await lens.runUnitOfWork("req-1", () => {
      const titles: string[] = [];
      for (let id = 1; id <= 3; id++) {
        const book = db
          .prepare<[number], Book>("SELECT id, title FROM books WHERE id = ?")
          .get(id);
        titles.push(book?.title ?? "");
      }
      return titles;
    });

    expect(report.groups).toHaveLength(3);
    const origins = report.groups.map((group) => group.origin);
    expect(origins[0]?.kind).toBe("resolved");
    expect(origins[1]).toEqual(origins[0]);
    expect(origins[2]).toEqual(origins[0]);
    expect(new Set(report.groups.map((group) => group.id)).size).toBe(3);
    expect(report.groups.map((group) => group.dependents.length)).toEqual([
      0, 0, 0,
    ]);
  });

  it("leaves a produced report untouched by later reads", async () => {
    const { lens, db } = setup();

    const outcome = await lens.runUnitOfWork("req-1", () => {
      const author = db
        .prepare<[], Author>("SELECT id, name, bio FROM authors WHERE id = 1")
        .get();
      expect(author?.name).toBe("Author One");
      return author;
    });

    expect(outcome.status).toBe("fulfilled");
    if (outcome.status !== "fulfilled") return;
    expect(outcome.value?.bio).toBe("First bio");
    expect(outcome.report.groups[0]?.fields.consumed).toEqual(
      new Set(["name"]),
    );
  });
});
