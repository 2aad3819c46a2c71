import fse from "fs-extra";
import { z } from "zod";

import { AnnotationError, RunNotFoundError } from "../core/errors.js";
import type { JsonObject, JsonValue } from "../core/logger.js";

import type { RunMetadataStore } from "./annotations.js";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const RunStoreFileSchema = z.object({
  runs: z.record(z.record(JsonValueSchema)).default({}),
});

type RunStoreFile = z.infer<typeof RunStoreFileSchema>;

/**
 * Run metadata kept in one JSON document keyed by run id. Every write rewrites the file.
 */
export class JsonRunMetadataStore implements RunMetadataStore {
  constructor(readonly filePath: string) {}

  async registerRun(runId: number, metadata: JsonObject = {}): Promise<void> {
    const file = await this.read();
    const key = String(runId);
    file.runs[key] = { ...(file.runs[key] ?? {}), ...metadata };
    await this.write(file);
  }

  async listRunIds(): Promise<number[]> {
    const file = await this.read();
    return Object.keys(file.runs)
      .map((key) => Number(key))
      .sort((a, b) => a - b);
  }

  async getMetadata(runId: number): Promise<JsonObject> {
    const file = await this.read();
    const metadata = file.runs[String(runId)];
    if (!metadata) {
      throw new RunNotFoundError(runId);
    }
    return { ...metadata };
  }

  async addMetadata(runId: number, key: string, value: JsonValue): Promise<void> {
    const file = await this.read();
    const metadata = file.runs[String(runId)];
    if (!metadata) {
      throw new RunNotFoundError(runId);
    }
    metadata[key] = value;
    await this.write(file);
  }

  private async read(): Promise<RunStoreFile> {
    if (!(await fse.pathExists(this.filePath))) {
      return { runs: {} };
    }

    const raw: unknown = await fse.readJson(this.filePath);
    const parsed = RunStoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AnnotationError(`Run metadata store at ${this.filePath} is not valid JSON metadata.`, parsed.error);
    }
    return parsed.data;
  }

  private async write(file: RunStoreFile): Promise<void> {
    await fse.outputJson(this.filePath, file, { spaces: 2 });
  }
}
