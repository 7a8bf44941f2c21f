/**
 * In-process tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { CommanderError } from "commander";
import { FieldResolutionError, SchemaBindingError } from "@searchmap/sdk";
import { ARTICLE_SCHEMA, createTempDir, removeDir, writeJsonFile, writeTextFile } from "@searchmap/testkit";
import { createProgram } from "../src/program.js";
import { CliError } from "../src/lib/errors.js";

const DEFINITION = {
  name: "articles",
  config: { type: "article" },
  fields: {
    id: { path: "id" },
    title: { path: "title" },
    author_s: { path: "author.name", optional: true },
  },
};

const RECORDS = [
  '{"id":"a-1","title":"One","author":{"name":"Ann"}}',
  '{"id":"a-2","title":"Two"}',
].join("\n");

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: "user" });
}

function spyOutput() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    stderr: vi.spyOn(process.stderr, "write").mockImplementation(() => true),
  };
}

describe("CLI", () => {
  let dir: string;
  let definitionPath: string;
  let schemaPath: string;
  let recordsPath: string;
  let output: ReturnType<typeof spyOutput>;

  function logged(): string[] {
    return output.log.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(async () => {
    dir = await createTempDir();
    definitionPath = await writeJsonFile(dir, "articles.indexer.json", DEFINITION);
    schemaPath = await writeJsonFile(dir, "schema.json", ARTICLE_SCHEMA);
    recordsPath = await writeTextFile(dir, "articles.jsonl", RECORDS + "\n");
    output = spyOutput();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  describe("check", () => {
    it("should list bindings as JSON", async () => {
      await run("check", "--definition", definitionPath, "--schema", schemaPath, "--json");

      expect(output.log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(logged()[0] ?? "")).toEqual([
        { field: "id", policy: "attribute", source: "id", dynamic: false, optional: false },
        { field: "title", policy: "attribute", source: "title", dynamic: false, optional: false },
        { field: "author_s", policy: "attribute", source: "author.name", dynamic: true, optional: true },
        { field: "meta_type_s", policy: "dynamic-hook", source: "meta_type", dynamic: true, optional: false },
        {
          field: "meta_index_timestamp_dt",
          policy: "dynamic-hook",
          source: "meta_index_timestamp",
          dynamic: true,
          optional: false,
        },
      ]);
    });

    it("should print a table of bindings", async () => {
      await run("check", "--definition", definitionPath, "--schema", schemaPath);

      const lines = logged();
      expect(lines[0]).toContain('Indexer "articles" (type "article") binds 5 field(s)');
      expect(lines[1]).toBe(
        ["FIELD".padEnd(23), "POLICY".padEnd(12), "SOURCE".padEnd(20), "OPTIONAL"].join("  ")
      );
      expect(lines[4]).toBe(
        ["author_s".padEnd(23), "attribute".padEnd(12), "author.name".padEnd(20), "yes"].join("  ")
      );
    });

    it("should fail on fields the schema does not know", async () => {
      const definition = await writeJsonFile(dir, "bad.indexer.json", {
        ...DEFINITION,
        fields: { ...DEFINITION.fields, subtitle: { path: "subtitle" } },
      });

      await expect(run("check", "--definition", definition, "--schema", schemaPath)).rejects.toBeInstanceOf(
        SchemaBindingError
      );
    });

    it("should report a missing definition file", async () => {
      const missing = join(dir, "missing.json");

      await expect(run("check", "--definition", missing, "--schema", schemaPath)).rejects.toThrow(
        new CliError(`Definition file not found: ${missing}`)
      );
    });

    it("should reject a missing required option", async () => {
      await expect(run("check", "--definition", definitionPath)).rejects.toBeInstanceOf(CommanderError);
      expect(output.stderr).toHaveBeenCalled();
    });
  });

  describe("transform", () => {
    it("should print one document per record", async () => {
      await run("transform", "--definition", definitionPath, "--records", recordsPath, "--schema", schemaPath);

      expect(logged().map((line) => JSON.parse(line))).toEqual([
        {
          id: "a-1",
          title: "One",
          author_s: "Ann",
          meta_type_s: "article",
          meta_index_timestamp_dt: expect.any(String),
        },
        {
          id: "a-2",
          title: "Two",
          meta_type_s: "article",
          meta_index_timestamp_dt: expect.any(String),
        },
      ]);
    });

    it("should read JSON array files without a schema", async () => {
      const records = await writeJsonFile(dir, "articles.json", [{ id: "a-9", title: "Nine" }]);

      await run("transform", "--definition", definitionPath, "--records", records);

      expect(logged()).toHaveLength(1);
      expect(JSON.parse(logged()[0] ?? "")).toMatchObject({ id: "a-9", title: "Nine", meta_type_s: "article" });
    });

    it("should fail on a record missing a required field", async () => {
      const records = await writeTextFile(dir, "broken.jsonl", '{"id":"a-3","title":null}\n');

      await expect(
        run("transform", "--definition", definitionPath, "--records", records)
      ).rejects.toBeInstanceOf(FieldResolutionError);
    });

    it("should skip such records when asked", async () => {
      const records = await writeTextFile(dir, "mixed.jsonl", RECORDS + '\n{"id":"a-3","title":null}\n');

      await run("transform", "--definition", definitionPath, "--records", records, "--skip-invalid");

      expect(logged()).toHaveLength(2);
      expect(String(output.stderr.mock.calls[0]?.[0])).toContain("Skipped record 2:");
    });
  });

  describe("reindex", () => {
    it("should create a snapshot and summarize the run", async () => {
      const snapshot = join(dir, "index.json");

      await run(
        "reindex",
        "--definition",
        definitionPath,
        "--schema",
        schemaPath,
        "--records",
        recordsPath,
        "--snapshot",
        snapshot,
        "--chunk-size",
        "1",
        "--json"
      );

      expect(JSON.parse(logged()[0] ?? "")).toEqual({
        type: "article",
        startedAt: expect.any(String),
        indexed: 2,
        skipped: 0,
        chunks: 2,
        removed: 0,
        documents: 2,
      });

      const saved: unknown = JSON.parse(await readFile(snapshot, "utf8"));
      expect(saved).toEqual([
        expect.objectContaining({ id: "a-1", author_s: "Ann" }),
        expect.objectContaining({ id: "a-2" }),
      ]);
    });

    it("should remove documents whose records are gone and keep other types", async () => {
      const snapshot = await writeJsonFile(dir, "index.json", [
        { id: "a-1", title: "Old", meta_type_s: "article", meta_index_timestamp_dt: "2020-01-01T00:00:00.000Z" },
        { id: "a-7", title: "Gone", meta_type_s: "article", meta_index_timestamp_dt: "2020-01-01T00:00:00.000Z" },
        { id: "p-1", title: "Page", meta_type_s: "page", meta_index_timestamp_dt: "2020-01-01T00:00:00.000Z" },
      ]);

      await run(
        "reindex",
        "--definition",
        definitionPath,
        "--schema",
        schemaPath,
        "--records",
        recordsPath,
        "--snapshot",
        snapshot
      );

      expect(logged()[0]).toContain('Reindexed 2 record(s) of type "article" in 1 chunk(s)');
      expect(logged().slice(1)).toEqual(["  Skipped: 0", "  Removed: 1", "  Documents in snapshot: 3"]);

      const saved: unknown = JSON.parse(await readFile(snapshot, "utf8"));
      expect(saved).toEqual([
        expect.objectContaining({ id: "a-1", title: "One" }),
        expect.objectContaining({ id: "p-1", title: "Page" }),
        expect.objectContaining({ id: "a-2", title: "Two" }),
      ]);
    });

    it("should leave the snapshot untouched when the run fails", async () => {
      const snapshot = join(dir, "index.json");
      const records = await writeTextFile(dir, "broken.jsonl", '{"id":"a-3","title":null}\n');

      await expect(
        run(
          "reindex",
          "--definition",
          definitionPath,
          "--schema",
          schemaPath,
          "--records",
          records,
          "--snapshot",
          snapshot
        )
      ).rejects.toBeInstanceOf(FieldResolutionError);
      await expect(readFile(snapshot, "utf8")).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("should reject an invalid chunk size", async () => {
      await expect(
        run(
          "reindex",
          "--definition",
          definitionPath,
          "--schema",
          schemaPath,
          "--records",
          recordsPath,
          "--snapshot",
          join(dir, "index.json"),
          "--chunk-size",
          "0"
        )
      ).rejects.toBeInstanceOf(CommanderError);
    });
  });
});
