import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { SqliteFactStore } from "../sqlite-fact-store.js";
import { ConfigError, ErrorCode, StoreError } from "../../errors.js";
import { createTestStore, fact } from "../../__tests__/fixtures/index.js";

describe("SqliteFactStore", () => {
  let store: SqliteFactStore;

  beforeEach(async () => {
    store = await createTestStore();
  });

  afterEach(async () => {
    await store.close();
  });

  describe("Lifecycle", () => {
    it("should report isReady after initialization", () => {
      expect(store.isReady).toBe(true);
    });

    it("should reject a database without a statement table", async () => {
      const bare = new SqliteFactStore({ path: ":memory:" });
      await expect(bare.initialize()).rejects.toMatchObject({
        code: ErrorCode.STORE_NOT_INITIALIZED,
      });
      expect(bare.isReady).toBe(false);
    });

    it("should reject an invalid statement table name before opening", () => {
      expect(() => new SqliteFactStore({ path: ":memory:", statementTable: "bad name" })).toThrow(
        ConfigError
      );
    });

    it("should fail queries after close", async () => {
      await store.close();
      await expect(store.parentsOf("EX:0002")).rejects.toBeInstanceOf(StoreError);
    });
  });

  describe("resolveIds", () => {
    it("should resolve identifiers and labels in input order", async () => {
      const resolved = await store.resolveIds(["thermometer", "EX:0002", "no such term"], "subject");

      expect(resolved).toEqual([
        { input: "thermometer", ids: ["EX:0004"], viaLabel: true },
        { input: "EX:0002", ids: ["EX:0002"], viaLabel: false },
        { input: "no such term", ids: [], viaLabel: true },
      ]);
    });

    it("should return every subject sharing a label", async () => {
      const [resolved] = await store.resolveIds(["duplicate label"], "subject");
      expect(resolved?.ids).toEqual(["EX:0500", "EX:0501"]);
    });

    it("should match predicate ids against the predicate column", async () => {
      const resolved = await store.resolveIds(["EX:0200", "definition", "EX:0009"], "predicate");

      expect(resolved.map((r) => r.ids)).toEqual([["EX:0200"], ["EX:0200"], []]);
    });

    it("should chunk long input lists", async () => {
      const small = await createTestStore(undefined, { maxSqlVars: 2 });
      const resolved = await small.resolveIds(
        ["EX:0001", "EX:0002", "EX:0003", "scale", "flask", "orphan"],
        "subject"
      );
      await small.close();

      expect(resolved.map((r) => r.ids[0])).toEqual([
        "EX:0001",
        "EX:0002",
        "EX:0003",
        "EX:0006",
        "EX:0008",
        "EX:0009",
      ]);
    });
  });

  describe("Hierarchy", () => {
    it("should return the full upward closure without structured parents", async () => {
      const edges = await store.ancestorEdges(["EX:0008"]);

      expect(edges).toEqual([
        { child: "EX:0001", parent: "owl:Thing" },
        { child: "EX:0002", parent: "EX:0001" },
        { child: "EX:0007", parent: "EX:0002" },
        { child: "EX:0008", parent: "EX:0007" },
      ]);
    });

    it("should include subproperty edges", async () => {
      expect(await store.ancestorEdges(["EX:0100"])).toEqual([
        { child: "EX:0100", parent: "EX:0101" },
      ]);
    });

    it("should return the full downward closure", async () => {
      expect(await store.descendantEdges(["EX:0003"])).toEqual([
        { child: "EX:0004", parent: "EX:0003" },
        { child: "EX:0005", parent: "EX:0004" },
        { child: "EX:0006", parent: "EX:0003" },
      ]);
    });

    it("should terminate on cyclic hierarchies", async () => {
      expect(await store.ancestorEdges(["EX:0401"])).toEqual([
        { child: "EX:0401", parent: "EX:0402" },
        { child: "EX:0402", parent: "EX:0401" },
      ]);
    });

    it("should merge edges across chunks", async () => {
      const small = await createTestStore(undefined, { maxSqlVars: 2 });
      const edges = await small.ancestorEdges(["EX:0005", "EX:0006", "EX:0008"]);
      await small.close();

      expect(edges).toEqual([
        { child: "EX:0001", parent: "owl:Thing" },
        { child: "EX:0002", parent: "EX:0001" },
        { child: "EX:0003", parent: "EX:0002" },
        { child: "EX:0004", parent: "EX:0003" },
        { child: "EX:0005", parent: "EX:0004" },
        { child: "EX:0006", parent: "EX:0003" },
        { child: "EX:0007", parent: "EX:0002" },
        { child: "EX:0008", parent: "EX:0007" },
      ]);
    });

    it("should return direct parents and children only", async () => {
      expect(await store.parentsOf("EX:0008")).toEqual(["EX:0007"]);
      expect(await store.childrenOf("EX:0002")).toEqual(["EX:0003", "EX:0007"]);
      expect(await store.childrenOf("EX:0009")).toEqual([]);
    });
  });

  describe("Facts", () => {
    it("should list predicates minus the excluded ones", async () => {
      const predicates = await store.listPredicates([
        "rdf:type",
        "rdfs:subClassOf",
        "rdfs:subPropertyOf",
      ]);
      expect(predicates).toEqual(["EX:0100", "EX:0200", "EX:0201", "rdfs:comment", "rdfs:label"]);
    });

    it("should filter facts by subject and predicate", async () => {
      const facts = await store.rawFactsFiltered(["EX:0004", "EX:0009"], ["rdfs:label", "EX:0201"]);

      expect(facts).toEqual([
        fact("EX:0004", "EX:0201", "EX:0009"),
        fact("EX:0004", "rdfs:label", "thermometer", "@en"),
        fact("EX:0009", "rdfs:label", "orphan", "@en"),
      ]);
    });

    it("should return nothing for an empty predicate filter", async () => {
      expect(await store.rawFactsFiltered(["EX:0004"], [])).toEqual([]);
    });

    it("should return annotation text exactly as stored", async () => {
      const annotated = fact(
        "EX:1",
        "rdfs:label",
        "one",
        "@en",
        '{"rdfs:comment":[{"datatype":"xsd:string","meta":"owl:Axiom","object":"checked"}]}'
      );
      const unparseable = fact("EX:1", "rdfs:comment", "note", "xsd:string", "{not json");
      const local = await createTestStore([annotated, unparseable]);
      const facts = await local.rawFactsFiltered(["EX:1"]);
      await local.close();

      expect(facts).toEqual([unparseable, annotated]);
    });
  });

  describe("Modules", () => {
    it("should replace a module in full", async () => {
      await store.replaceModule("extract", [fact("EX:1", "rdf:type", "owl:Class")]);
      await store.replaceModule("extract", [
        fact("EX:2", "rdf:type", "owl:Class"),
        fact("EX:2", "rdfs:label", "two", "@en"),
      ]);

      expect(await store.moduleExists("extract")).toBe(true);
      expect(await store.readModule("extract")).toEqual([
        fact("EX:2", "rdf:type", "owl:Class"),
        fact("EX:2", "rdfs:label", "two", "@en"),
      ]);
    });

    it("should keep the previous module when a write fails", async () => {
      await store.replaceModule("extract", [fact("EX:1", "rdf:type", "owl:Class")]);

      // NaN binds as NULL, so the second row breaks the NOT NULL constraint
      await expect(
        store.replaceModule("extract", [
          fact("EX:3", "rdf:type", "owl:Class"),
          { ...fact("EX:3", "rdfs:label", "three", "@en"), assertion: Number.NaN },
        ])
      ).rejects.toMatchObject({
        code: ErrorCode.STORE_WRITE_FAILED,
        message: expect.stringMatching(/^Failed to write module 'extract': NOT NULL constraint failed/),
      });

      expect(await store.readModule("extract")).toEqual([fact("EX:1", "rdf:type", "owl:Class")]);
    });

    it("should refuse invalid names and the statement table", async () => {
      await expect(store.replaceModule("drop table", [])).rejects.toBeInstanceOf(ConfigError);
      await expect(store.replaceModule("statement", [])).rejects.toBeInstanceOf(StoreError);
      expect(await store.moduleExists("missing")).toBe(false);
    });
  });

  describe("Prefixes", () => {
    it("should load the prefix table", async () => {
      const prefixes = await store.getPrefixes();
      expect(prefixes.size).toBe(5);
      expect(prefixes.compact("<http://example.org/ex/EX_0004>")).toBe("EX:0004");
    });

    it("should return an empty registry when no prefixes are registered", async () => {
      const local = await createTestStore([fact("EX:1", "rdf:type", "owl:Class")]);
      expect((await local.getPrefixes()).size).toBe(0);
      await local.close();
    });
  });

  describe("Files", () => {
    it("should reopen an existing database file", async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ontomod-store-"));
      const file = path.join(dir, "ontology.db");
      try {
        const created = new SqliteFactStore({ path: file, create: true });
        await created.initialize();
        await created.insertFacts([fact("EX:2", "rdfs:subClassOf", "EX:1")]);
        await created.close();

        const reopened = new SqliteFactStore({ path: file });
        await reopened.initialize();
        expect(await reopened.parentsOf("EX:2")).toEqual(["EX:1"]);
        await reopened.close();
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it("should fail to open a missing file", async () => {
      const missing = new SqliteFactStore({ path: path.join(os.tmpdir(), "ontomod-missing", "none.db") });
      await expect(missing.initialize()).rejects.toMatchObject({
        code: ErrorCode.STORE_CONNECTION_FAILED,
      });
    });
  });
});
