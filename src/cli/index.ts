import { Command } from "commander";

import { registerAnnotateCommand, registerRunsCommand } from "./annotate.js";
import { registerMeasureCommand, registerParamCommand } from "./param.js";
import { registerSessionCommand } from "./session.js";
import { registerStationCommand } from "./station.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("rig")
    .description("Profile-driven station setup and must-update parameters for measurement rigs")
    .version("0.1.0")
    .option("-c, --config <path>", "Path to rig.yaml", "rig.yaml")
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerStationCommand(program);
  registerParamCommand(program);
  registerMeasureCommand(program);
  registerAnnotateCommand(program);
  registerRunsCommand(program);
  registerSessionCommand(program);

  return program;
}
