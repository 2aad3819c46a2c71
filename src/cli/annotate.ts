import { Command } from "commander";

import { annotateRuns, appendAnnotation } from "../annotations/annotations.js";
import { JsonlLogger } from "../core/logger.js";

import { buildCliContext } from "./context.js";
import { formatValue, parseMetadataEntries, parseRunIds, printTable, runGuarded } from "./output.js";

type AnnotateOptions = {
  annotation?: string;
  error?: boolean;
  meta?: string[];
  append: boolean;
  inspectorFlag: boolean;
};

export function registerAnnotateCommand(program: Command): void {
  program
    .command("annotate")
    .description("Annotate recorded measurement runs")
    .argument("<runIds...>", "Run ids to annotate")
    .option("--annotation <text>", "Annotation text")
    .option("--error", "Flag the runs as containing errors")
    .option("--no-error", "Flag the runs as error-free")
    .option("--meta <entries...>", "Extra metadata as key=value (value parsed as JSON when possible)")
    .option("--append", "Append to the existing annotation instead of replacing it", false)
    .option("--no-inspector-flag", "Do not tag error runs with a cross in the data inspector")
    .action(async (rawIds: string[], opts: AnnotateOptions, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const runIds = parseRunIds(rawIds);
        const write = opts.append ? appendAnnotation : annotateRuns;

        await write(ctx.runStore, runIds, {
          annotation: opts.annotation,
          errorState: opts.error,
          otherMetadata: parseMetadataEntries(opts.meta),
          flagInInspector: opts.inspectorFlag,
          logger: new JsonlLogger(ctx.paths.sessionLogPath),
        });
        console.log(`Annotated run(s) ${runIds.join(", ")}.`);
      });
    });
}

export function registerRunsCommand(program: Command): void {
  const runs = program.command("runs").description("Recorded measurement runs");

  runs
    .command("add")
    .description("Record a run so it can be annotated")
    .argument("<runId>", "Run id")
    .option("--meta <entries...>", "Initial metadata as key=value")
    .action(async (rawId: string, opts: { meta?: string[] }, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const [runId] = parseRunIds([rawId]);
        if (runId === undefined) return;
        await ctx.runStore.registerRun(runId, parseMetadataEntries(opts.meta));
        console.log(`Recorded run ${runId}.`);
      });
    });

  runs
    .command("show")
    .description("Show the metadata of a run")
    .argument("<runId>", "Run id")
    .action(async (rawId: string, _opts: unknown, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const [runId] = parseRunIds([rawId]);
        if (runId === undefined) return;
        const metadata = await ctx.runStore.getMetadata(runId);
        const rows = Object.entries(metadata).map(([key, value]) => [key, formatValue(value)]);
        if (rows.length === 0) {
          console.log(`Run ${runId} has no metadata.`);
          return;
        }
        printTable(["Key", "Value"], rows);
      });
    });
}
