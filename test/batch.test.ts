/**
 * Tests for file discovery, archiving and batch conversion.
 */
import * as fs from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { Archive, MANIFEST_NAME } from "../src/batch/archive";
import { runBatch } from "../src/batch/batch";
import { findSources, isPythonSource } from "../src/batch/discover";
import { convertFile } from "../src/batch/file";
import { runPool } from "../src/batch/pool";
import { convert } from "../src/convert/convert";
import { MalformedConstruct } from "../src/errors";

const FIXTURES = path.join(__dirname, "fixtures");

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(tmpdir(), "posonly-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function copyFixture(name: string, target: string = name): Promise<string> {
  const file = path.join(dir, target);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.copyFile(path.join(FIXTURES, name), file);
  return file;
}

describe("findSources", () => {
  it("walks directories for Python sources", async () => {
    const a = await copyFixture("plain.py", "a.py");
    const b = await copyFixture("plain.py", "pkg/b.pyw");
    await copyFixture("plain.py", "notes.txt");
    await fs.symlink(a, path.join(dir, "link.py"));

    const { files, missing } = await findSources([dir, a, path.join(dir, "gone.py")]);
    expect(files).toEqual([a, b].sort());
    expect(missing).toEqual([path.join(dir, "gone.py")]);
  });

  it("matches source extensions", () => {
    expect(isPythonSource("x/mod.py")).toBe(true);
    expect(isPythonSource("x/MOD.PYW")).toBe(true);
    expect(isPythonSource("x/mod.pyc")).toBe(false);
  });
});

describe("Archive", () => {
  it("stores copies and recovers originals", async () => {
    const file = await copyFixture("sample.py");
    const original = await fs.readFile(file, "utf8");
    const archive = new Archive(path.join(dir, "archive"));

    const entry = await archive.store(file);
    expect(entry.original).toBe(path.resolve(file));
    expect(entry.archived.startsWith("sample-")).toBe(true);
    expect(entry.archived.endsWith(".py")).toBe(true);

    await fs.writeFile(file, "changed\n");
    await archive.store(file);
    expect(await archive.entries()).toHaveLength(2);

    const restored = await archive.recover();
    expect(restored).toEqual([entry]);
    expect(await fs.readFile(file, "utf8")).toBe(original);
  });

  it("has no entries before anything is stored", async () => {
    const archive = new Archive(path.join(dir, "empty"));
    expect(await archive.entries()).toEqual([]);
    expect(archive.manifestPath).toBe(path.join(dir, "empty", MANIFEST_NAME));
  });
});

describe("convertFile", () => {
  it("rewrites the file and archives the original", async () => {
    const file = await copyFixture("sample.py");
    const source = await fs.readFile(file, "utf8");
    const archive = new Archive(path.join(dir, "archive"));

    const outcome = await convertFile(file, { convert: {}, encoding: "utf8", archive });
    expect(outcome.state).toBe("assembled");
    expect(outcome.written).toBe(true);
    expect(outcome.archived?.original).toBe(path.resolve(file));
    expect(await fs.readFile(file, "utf8")).toBe(convert(source));
    expect((await fs.readdir(dir)).sort()).toEqual(["archive", "sample.py"]);
  });

  it("writes nothing on a dry run", async () => {
    const file = await copyFixture("sample.py");
    const source = await fs.readFile(file, "utf8");
    const outcome = await convertFile(file, { convert: {}, encoding: "utf8", dryRun: true });
    expect(outcome.state).toBe("assembled");
    expect(outcome.written).toBe(false);
    expect(outcome.edits.length).toBeGreaterThan(0);
    expect(await fs.readFile(file, "utf8")).toBe(source);
  });
});

describe("runBatch", () => {
  it("keeps failures local to their file", async () => {
    const sample = await copyFixture("sample.py");
    const plain = await copyFixture("plain.py");
    const broken = await copyFixture("broken.py");
    const brokenSource = await fs.readFile(broken, "utf8");
    const seen: string[] = [];
    const errors: string[] = [];

    const summary = await runBatch([broken, plain, sample], {
      convert: {},
      encoding: "utf8",
      concurrency: 2,
      onFile: (outcome) => seen.push(outcome.file),
      onError: (file, error) => errors.push(`${file}: ${error instanceof Error ? error.name : "?"}`),
    });

    expect(summary.converted.map((o) => o.file)).toEqual([sample]);
    expect(summary.unchanged.map((o) => o.file)).toEqual([plain]);
    expect(summary.failed).toHaveLength(1);
    expect(summary.failed[0].file).toBe(broken);
    expect(summary.failed[0].error).toBeInstanceOf(MalformedConstruct);
    expect(summary.skipped).toEqual([]);
    expect(seen.sort()).toEqual([plain, sample].sort());
    expect(errors).toEqual([`${broken}: MalformedConstruct`]);
    expect(await fs.readFile(broken, "utf8")).toBe(brokenSource);
  });

  it("starts nothing once aborted", async () => {
    const sample = await copyFixture("sample.py");
    const controller = new AbortController();
    controller.abort();
    const summary = await runBatch([sample], { convert: {}, encoding: "utf8", signal: controller.signal });
    expect(summary.skipped).toEqual([sample]);
    expect(summary.converted).toEqual([]);
  });
});

describe("runPool", () => {
  it("limits tasks in flight", async () => {
    let running = 0;
    let peak = 0;
    const outcomes = await runPool(
      [1, 2, 3, 4, 5],
      async (n) => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return n * 2;
      },
      { concurrency: 2 }
    );
    expect(peak).toBe(2);
    expect(outcomes.map((o) => (o.status === "fulfilled" ? o.value : null))).toEqual([2, 4, 6, 8, 10]);
  });

  it("stops after the first failure with failFast", async () => {
    const outcomes = await runPool(
      ["a", "b", "c"],
      async (item) => {
        if (item === "a") throw new Error("boom");
        return item;
      },
      { concurrency: 1, failFast: true }
    );
    expect(outcomes.map((o) => o.status)).toEqual(["rejected", "skipped", "skipped"]);
  });

  it("keeps going without failFast", async () => {
    const outcomes = await runPool(
      ["a", "b"],
      async (item) => {
        if (item === "a") throw new Error("boom");
        return item;
      },
      { concurrency: 1 }
    );
    expect(outcomes.map((o) => o.status)).toEqual(["rejected", "fulfilled"]);
  });
});
