import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { z } from "zod";
import { JsonFileDocument, ReadOnlyDocument } from "./json-document";

const schema = z.object({ messageIds: z.array(z.string()) });

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "reconciler-doc-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("JsonFileDocument", () => {
  it("reads a missing file as null", async () => {
    const doc = new JsonFileDocument(join(tempDir, "nope.json"), schema);
    expect(await doc.read()).toBeNull();
  });

  it("writes formatted JSON and reads it back", async () => {
    const filePath = join(tempDir, "nested", "processed.json");
    const doc = new JsonFileDocument(filePath, schema);

    await doc.write({ messageIds: ["m1", "m2"] });

    expect(await readFile(filePath, "utf-8")).toBe(
      '{\n  "messageIds": [\n    "m1",\n    "m2"\n  ]\n}\n'
    );
    expect(await doc.read()).toEqual({ messageIds: ["m1", "m2"] });
  });

  it("reads malformed JSON as null", async () => {
    const filePath = join(tempDir, "broken.json");
    await writeFile(filePath, "{ not json", "utf-8");
    expect(await new JsonFileDocument(filePath, schema).read()).toBeNull();
  });

  it("reads schema violations as null", async () => {
    const filePath = join(tempDir, "wrong.json");
    await writeFile(filePath, JSON.stringify({ messageIds: [1, 2] }), "utf-8");
    expect(await new JsonFileDocument(filePath, schema).read()).toBeNull();
  });
});

describe("ReadOnlyDocument", () => {
  it("reads through and ignores writes", async () => {
    const filePath = join(tempDir, "processed.json");
    const inner = new JsonFileDocument(filePath, schema);
    await inner.write({ messageIds: ["m1"] });

    const readOnly = new ReadOnlyDocument(inner);
    await readOnly.write({ messageIds: ["m1", "m2"] });

    expect(await readOnly.read()).toEqual({ messageIds: ["m1"] });
  });
});
