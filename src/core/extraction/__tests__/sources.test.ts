import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadImportTerms, loadSourceOptions } from "../sources.js";
import { ErrorCode } from "../../errors.js";

describe("source files", () => {
  let dir: string;

  async function write(name: string, lines: string[]): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, lines.join("\n"), "utf-8");
    return file;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ontomod-sources-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("loadImportTerms", () => {
    it("should read the rows of one source", async () => {
      const file = await write("imports.tsv", [
        "ID\tParent ID\tRelated\tSource",
        "EX:0004\t\tancestors\tex",
        "EX:0006\tEX:0002\t\tex",
        "OTHER:1\t\t\tother",
        "\t\tdescendants\tex",
      ]);

      expect(await loadImportTerms(file, "ex")).toEqual([
        { id: "EX:0004", parent: undefined, related: "ancestors" },
        { id: "EX:0006", parent: "EX:0002", related: undefined },
      ]);
    });

    it("should read every row without a source", async () => {
      const file = await write("imports.tsv", ["ID\tSource", "EX:0004\tex", "OTHER:1\tother"]);

      expect((await loadImportTerms(file)).map((seed) => seed.id)).toEqual(["EX:0004", "OTHER:1"]);
    });

    it("should apply a file without a Source column to any source", async () => {
      const file = await write("imports.csv", ["ID,Related", "EX:0004,parents children"]);

      expect(await loadImportTerms(file, "ex")).toEqual([
        { id: "EX:0004", parent: undefined, related: "parents children" },
      ]);
    });

    it("should require an ID column", async () => {
      const file = await write("imports.tsv", ["Term\tSource", "EX:0004\tex"]);

      await expect(loadImportTerms(file)).rejects.toMatchObject({
        code: ErrorCode.CONFIG_FILE_INVALID,
        message: `${file} is missing required column(s): ID`,
      });
    });
  });

  describe("loadSourceOptions", () => {
    it("should read the options of one source", async () => {
      const file = await write("config.tsv", [
        "Source\tIntermediates\tPredicates\tIRI",
        "other\tall\trdfs:label\t",
        "ex\tnone\trdfs:label  EX:0200\thttp://example.org/ex.owl",
      ]);

      expect(await loadSourceOptions(file, "ex")).toEqual({
        source: "ex",
        intermediates: "none",
        predicates: ["rdfs:label", "EX:0200"],
        importedFrom: "http://example.org/ex.owl",
      });
    });

    it("should leave blank cells undefined", async () => {
      const file = await write("config.csv", ["Source,Intermediates,Predicates,IRI", "ex,,,"]);

      expect(await loadSourceOptions(file, "ex")).toEqual({
        source: "ex",
        intermediates: undefined,
        predicates: [],
        importedFrom: undefined,
      });
    });

    it("should reject an unknown source", async () => {
      const file = await write("config.tsv", ["Source\tIntermediates", "ex\tall"]);

      await expect(loadSourceOptions(file, "missing")).rejects.toMatchObject({
        code: ErrorCode.CONFIG_SOURCE_NOT_FOUND,
        message: `Source 'missing' does not exist in config file: ${file}`,
      });
    });

    it("should reject a missing file", async () => {
      await expect(loadSourceOptions(path.join(dir, "absent.tsv"), "ex")).rejects.toMatchObject({
        code: ErrorCode.CONFIG_FILE_INVALID,
      });
    });
  });
});
