import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ExtractionOrchestrator, type ExtractionPhase } from "../orchestrator.js";
import { ConfigError, ErrorCode, LookupError, StoreError } from "../../errors.js";
import { createTestStore, fact } from "../../__tests__/fixtures/index.js";
import type { SqliteFactStore } from "../../store/sqlite-fact-store.js";
import { buildModuleSpec } from "../../../utils/validation.js";

describe("ExtractionOrchestrator", () => {
  let store: SqliteFactStore;
  let orchestrator: ExtractionOrchestrator;

  beforeEach(async () => {
    store = await createTestStore();
    orchestrator = new ExtractionOrchestrator(store);
  });

  afterEach(async () => {
    await store.close();
  });

  describe("extract", () => {
    it("should write a term with its full ancestry", async () => {
      const spec = buildModuleSpec({
        seeds: [{ id: "EX:0005", related: "ancestors" }],
        predicates: ["rdfs:label"],
      });

      const result = await orchestrator.extract(spec);

      expect(result.extractTable).toBe("extract");
      expect(result.terms).toEqual(["EX:0001", "EX:0002", "EX:0003", "EX:0004", "EX:0005"]);
      expect(result.predicates).toEqual(["rdfs:label"]);
      expect(result.edges).toBe(4);
      expect(result.facts).toBe(14);
      expect(await store.readModule("extract")).toEqual([
        fact("EX:0001", "rdf:type", "owl:Class"),
        fact("EX:0002", "rdf:type", "owl:Class"),
        fact("EX:0003", "rdf:type", "owl:Class"),
        fact("EX:0004", "rdf:type", "owl:Class"),
        fact("EX:0005", "rdf:type", "owl:Class"),
        fact("EX:0002", "rdfs:subClassOf", "EX:0001"),
        fact("EX:0003", "rdfs:subClassOf", "EX:0002"),
        fact("EX:0004", "rdfs:subClassOf", "EX:0003"),
        fact("EX:0005", "rdfs:subClassOf", "EX:0004"),
        fact("EX:0001", "rdfs:label", "material entity", "@en"),
        fact("EX:0002", "rdfs:label", "device", "@en"),
        fact("EX:0003", "rdfs:label", "measuring device", "@en"),
        fact("EX:0004", "rdfs:label", "thermometer", "@en"),
        fact("EX:0005", "rdfs:label", "digital thermometer", "@en"),
      ]);
    });

    it("should skip intermediates with intermediates none", async () => {
      const spec = buildModuleSpec({
        seeds: [{ id: "EX:0005", related: "ancestors" }],
        predicates: ["rdfs:label"],
        intermediates: "none",
      });

      await orchestrator.extract(spec, { extractTable: "minimal" });

      expect(await store.readModule("minimal")).toEqual([
        fact("EX:0001", "rdf:type", "owl:Class"),
        fact("EX:0005", "rdf:type", "owl:Class"),
        fact("EX:0005", "rdfs:subClassOf", "EX:0001"),
        fact("EX:0001", "rdfs:label", "material entity", "@en"),
        fact("EX:0005", "rdfs:label", "digital thermometer", "@en"),
      ]);
    });

    it("should write each edge of a cycle once", async () => {
      const spec = buildModuleSpec({
        seeds: [{ id: "EX:0401", related: "ancestors" }],
        predicates: ["rdfs:label"],
      });

      await orchestrator.extract(spec);
      const edges = (await store.readModule("extract")).filter(
        (row) => row.predicate === "rdfs:subClassOf"
      );

      expect(edges).toEqual([
        fact("EX:0401", "rdfs:subClassOf", "EX:0402"),
        fact("EX:0402", "rdfs:subClassOf", "EX:0401"),
      ]);
    });

    it("should write identical modules for identical input", async () => {
      const spec = buildModuleSpec({
        seeds: [
          { id: "EX:0008", related: "ancestors" },
          { id: "EX:0003", related: "descendants" },
        ],
      });

      await orchestrator.extract(spec, { extractTable: "first" });
      await orchestrator.extract(spec, { extractTable: "second" });

      expect(await store.readModule("second")).toEqual(await store.readModule("first"));
    });

    it("should offer every non-structural predicate without a filter", async () => {
      const spec = buildModuleSpec({ seeds: [{ id: "EX:0004" }] });

      const result = await orchestrator.extract(spec);

      expect(result.predicates).toEqual(["EX:0100", "EX:0200", "EX:0201", "rdfs:comment", "rdfs:label"]);
      expect(await store.readModule("extract")).toEqual([
        fact("EX:0004", "rdf:type", "owl:Class"),
        fact("EX:0004", "EX:0200", "A measuring device that reports temperature.", "@en"),
        fact("EX:0004", "rdfs:comment", "fixture comment", "xsd:string"),
        fact("EX:0004", "rdfs:label", "thermometer", "@en"),
        fact("EX:0004", "EX:0201", "EX:0009"),
      ]);
    });

    it("should assert an override parent with the hierarchy suppressed", async () => {
      const spec = buildModuleSpec({
        seeds: [{ id: "EX:0005", parent: "EX:0009" }, { id: "EX:0009" }],
        predicates: ["rdfs:label"],
        noHierarchy: true,
      });

      const result = await orchestrator.extract(spec);

      expect(result.edges).toBe(1);
      expect(
        (await store.readModule("extract")).filter((row) => row.predicate === "rdfs:subClassOf")
      ).toEqual([fact("EX:0005", "rdfs:subClassOf", "EX:0009")]);
    });
  });

  describe("seed resolution", () => {
    it("should resolve labels and bracketed IRIs", async () => {
      const spec = buildModuleSpec({
        seeds: [{ id: "thermometer" }, { id: "<http://example.org/ex/EX_0006>" }],
        predicates: ["rdfs:label"],
      });

      const result = await orchestrator.extract(spec);

      expect(result.terms).toEqual(["EX:0004", "EX:0006"]);
    });

    it("should report inputs that do not resolve", async () => {
      const spec = buildModuleSpec({
        seeds: [{ id: "EX:0004" }, { id: "missing term" }],
        predicates: ["rdfs:label", "no such predicate"],
      });

      const result = await orchestrator.extract(spec);

      expect(result.terms).toEqual(["EX:0004"]);
      expect(result.unresolved).toEqual({
        seeds: ["missing term"],
        predicates: ["no such predicate"],
      });
    });

    it("should fail when no seed resolves", async () => {
      const spec = buildModuleSpec({ seeds: [{ id: "nothing here" }] });

      await expect(orchestrator.extract(spec)).rejects.toMatchObject({
        code: ErrorCode.LOOKUP_NO_SEEDS_RESOLVED,
      });
      expect(await store.moduleExists("extract")).toBe(false);
    });

    it("should fail when no filtered predicate resolves", async () => {
      const spec = buildModuleSpec({ seeds: [{ id: "EX:0004" }], predicates: ["nope"] });

      await expect(orchestrator.extract(spec)).rejects.toMatchObject({
        code: ErrorCode.LOOKUP_NO_PREDICATES_RESOLVED,
      });
    });

    it("should reject an ambiguous label", async () => {
      const spec = buildModuleSpec({ seeds: [{ id: "duplicate label" }] });

      const error = await orchestrator.extract(spec).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(LookupError);
      expect(error).toMatchObject({
        code: ErrorCode.LOOKUP_AMBIGUOUS_LABEL,
        inputs: ["duplicate label"],
      });
    });
  });

  describe("annotations", () => {
    it("should copy annotations exactly as stored", async () => {
      const xref = '{"oboInOwl:hasDbXref":[{"datatype":"xsd:string","meta":"owl:Axiom","object":"PMID:1"}]}';
      const nested =
        '{"owl:annotatedTarget":[{"datatype":"_JSON","object":{"owl:someValuesFrom":[{"datatype":"_IRI","object":"EX:2"}]}}]}';
      const statements = [
        fact("EX:1", "rdf:type", "owl:Class"),
        fact("EX:1", "rdfs:label", "one", "@en", xref),
        fact("EX:1", "rdfs:comment", "first", "@en", nested),
      ];
      const local = await createTestStore(statements);
      const spec = buildModuleSpec({
        seeds: [{ id: "EX:1" }],
        predicates: ["rdfs:label", "rdfs:comment"],
      });

      try {
        await new ExtractionOrchestrator(local).extract(spec);

        expect(await local.readModule("extract")).toEqual([
          fact("EX:1", "rdf:type", "owl:Class"),
          fact("EX:1", "rdfs:comment", "first", "@en", nested),
          fact("EX:1", "rdfs:label", "one", "@en", xref),
        ]);
      } finally {
        await local.close();
      }
    });

    it("should copy annotations that are incomplete or not JSON", async () => {
      const missingDatatype = '{"rdfs:comment":[{"object":"x"}]}';
      const statements = [
        fact("EX:1", "rdf:type", "owl:Class", "_IRI", "{not json"),
        fact("EX:1", "rdfs:label", "one", "@en", missingDatatype),
        fact("EX:1", "rdfs:label", "uno", "@es", '{"rdfs:comment":[{"datatype":"xsd:integer","object":7}]}'),
      ];
      const local = await createTestStore(statements);
      const spec = buildModuleSpec({ seeds: [{ id: "EX:1" }], predicates: ["rdfs:label"] });

      try {
        const result = await new ExtractionOrchestrator(local).extract(spec);

        expect(result.facts).toBe(3);
        expect(await local.readModule("extract")).toEqual(statements);
      } finally {
        await local.close();
      }
    });
  });

  describe("run lifecycle", () => {
    it("should report every phase in order", async () => {
      const seen: ExtractionPhase[] = [];
      const spec = buildModuleSpec({ seeds: [{ id: "EX:0004" }], predicates: ["rdfs:label"] });

      const result = await orchestrator.extract(spec, { onPhase: (phase) => seen.push(phase) });

      expect(seen).toEqual([
        "ResolvingSeeds",
        "ExpandingRelated",
        "AssigningParents",
        "SynthesizingStatements",
        "Done",
        "CleaningUp",
      ]);
      expect(result.phases).toEqual(seen);
    });

    it("should clean up after a failed write", async () => {
      vi.spyOn(store, "replaceModule").mockRejectedValueOnce(
        new StoreError("disk full", ErrorCode.STORE_WRITE_FAILED)
      );
      const seen: ExtractionPhase[] = [];
      const spec = buildModuleSpec({ seeds: [{ id: "EX:0004" }], predicates: ["rdfs:label"] });

      await expect(
        orchestrator.extract(spec, { onPhase: (phase) => seen.push(phase) })
      ).rejects.toBeInstanceOf(StoreError);
      expect(seen.slice(-2)).toEqual(["SynthesizingStatements", "CleaningUp"]);
    });

    it("should reject an invalid output table before touching the store", async () => {
      const spy = vi.spyOn(store, "getPrefixes");
      const spec = buildModuleSpec({ seeds: [{ id: "EX:0004" }] });

      await expect(orchestrator.extract(spec, { extractTable: "bad-name" })).rejects.toBeInstanceOf(
        ConfigError
      );
      expect(spy).not.toHaveBeenCalled();
    });

    it("should give each run its own id", async () => {
      const spec = buildModuleSpec({ seeds: [{ id: "EX:0004" }], predicates: ["rdfs:label"] });

      const [first, second] = await Promise.all([
        orchestrator.extract(spec, { extractTable: "one" }),
        orchestrator.extract(spec, { extractTable: "two" }),
      ]);

      expect(first.runId).not.toBe(second.runId);
      expect(await store.readModule("one")).toEqual(await store.readModule("two"));
    });
  });
});
