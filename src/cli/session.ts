import { Command } from "commander";

import { buildCliContext } from "./context.js";
import { runGuarded } from "./output.js";

export function registerSessionCommand(program: Command): void {
  const session = program.command("session").description("Persisted session state");

  session
    .command("reset")
    .description("Forget the registered components and parameter values")
    .action(async (_opts: unknown, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const removed = await ctx.sessionStore.clear();
        console.log(removed ? "Session state cleared." : "No session state to clear.");
      });
    });
}
