import { Command } from "commander";

import { beginMeasurement, getParameter } from "../session/session.js";

import { buildCliContext, loadSession, withSession } from "./context.js";
import { formatValue, parseCliValue, printTable, runGuarded } from "./output.js";

export function registerParamCommand(program: Command): void {
  const param = program.command("param").description("Set and read must-update parameters");

  param
    .command("set")
    .description("Give a parameter a new value (parsed as JSON when possible)")
    .argument("<name>", "Parameter name")
    .argument("<value>", "New value")
    .action(async (name: string, raw: string, _opts: unknown, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const value = parseCliValue(raw);
        await withSession(ctx, (session) => getParameter(session, name).set(value));
        console.log(`${name} = ${formatValue(value)}`);
      });
    });

  param
    .command("get")
    .description("Read a parameter value")
    .argument("<name>", "Parameter name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const value = await withSession(ctx, (session) => getParameter(session, name).get());
        console.log(formatValue(value));
      });
    });

  param
    .command("list")
    .description("Show every configured parameter and its flags")
    .action(async (_opts: unknown, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const session = await loadSession(ctx);
        const parameters = [...session.parameters.values()];
        if (parameters.length === 0) {
          console.log("No parameters configured.");
          return;
        }
        printTable(
          ["Name", "Value", "Unit", "Consumed", "Read", "Registered"],
          parameters.map((parameter) => [
            parameter.name,
            formatValue(parameter.peek()),
            parameter.unit || "-",
            yesNo(parameter.isConsumed),
            yesNo(parameter.isReadSinceSet),
            yesNo(session.registry.has(parameter.name)),
          ]),
        );
      });
    });
}

export function registerMeasureCommand(program: Command): void {
  const measure = program.command("measure").description("Measurement lifecycle");

  measure
    .command("begin")
    .description("Check every parameter was updated since the last measurement and claim it")
    .option("--param <names...>", "Only sweep these parameters")
    .option("--quiet", "Skip per-parameter output", false)
    .action(async (opts: { param?: string[]; quiet: boolean }, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const claimed = await withSession(ctx, (session) =>
          beginMeasurement(session, {
            parameters: opts.param,
            verbose: opts.quiet ? false : undefined,
          }),
        );
        console.log(`Measurement ready: ${Object.keys(claimed).length} parameter(s) claimed.`);
      });
    });
}

function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}
