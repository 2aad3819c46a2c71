import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { AnnotationError, RunNotFoundError } from "../core/errors.js";

import { JsonRunMetadataStore } from "./run-store.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeStorePath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rig-runs-"));
  tempDirs.push(dir);
  return path.join(dir, "nested", "runs.json");
}

describe("JsonRunMetadataStore", () => {
  it("persists metadata across store instances", async () => {
    const filePath = makeStorePath();
    await new JsonRunMetadataStore(filePath).registerRun(12, { sample: "B7" });
    await new JsonRunMetadataStore(filePath).addMetadata(12, "errors_in_measurement", false);

    const metadata = await new JsonRunMetadataStore(filePath).getMetadata(12);

    expect(metadata).toEqual({ sample: "B7", errors_in_measurement: false });
  });

  it("lists run ids in numeric order", async () => {
    const store = new JsonRunMetadataStore(makeStorePath());
    await store.registerRun(10);
    await store.registerRun(2);

    expect(await store.listRunIds()).toEqual([2, 10]);
  });

  it("fails for runs that were never recorded", async () => {
    const store = new JsonRunMetadataStore(makeStorePath());

    await expect(store.addMetadata(5, "k", "v")).rejects.toBeInstanceOf(RunNotFoundError);
    await expect(store.getMetadata(5)).rejects.toThrow("Run 5 does not exist in the run metadata store.");
  });

  it("rejects a malformed store file", async () => {
    const filePath = makeStorePath();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ runs: [1, 2] }), "utf8");

    await expect(new JsonRunMetadataStore(filePath).getMetadata(1)).rejects.toBeInstanceOf(
      AnnotationError,
    );
  });
});
