import { Command } from "commander";

import { applyProfiles } from "../session/session.js";

import { buildCliContext, loadSession, withSession } from "./context.js";
import { printTable, runGuarded } from "./output.js";

export function registerStationCommand(program: Command): void {
  const station = program
    .command("station")
    .description("Reconfigure which components the station holds");

  station
    .command("profiles")
    .description("List configured profiles and their components")
    .action(async (_opts: unknown, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const entries = Object.entries(ctx.config.profiles);
        if (entries.length === 0) {
          console.log("No profiles configured.");
          return;
        }
        for (const [name, members] of entries) {
          console.log(`${name}: ${members.length > 0 ? members.join(", ") : "(empty)"}`);
        }
      });
    });

  station
    .command("apply")
    .description("Make the station hold exactly the components of the given profiles")
    .argument("<profiles...>", "Profiles to activate")
    .option("--dry-run", "Show the changes without applying them", false)
    .option("--quiet", "Skip the component summary", false)
    .action(
      async (profiles: string[], opts: { dryRun: boolean; quiet: boolean }, command: Command) => {
        await runGuarded(command, async () => {
          const ctx = buildCliContext(command);

          if (opts.dryRun) {
            const session = await loadSession(ctx);
            const plan = session.station.planReconcile(profiles);
            console.log(`Dry run for profiles: ${plan.activeProfiles.join(", ")}`);
            console.log(`- add: ${listOrNone(plan.add.map((c) => c.name))}`);
            console.log(`- remove: ${listOrNone(plan.removeFromRegistry)}`);
            console.log(`- untracked: ${listOrNone(plan.untracked)}`);
            return;
          }

          const result = await withSession(ctx, (session) =>
            applyProfiles(session, profiles, { verbose: opts.quiet ? false : undefined }),
          );
          console.log(
            `Applied profiles ${profiles.join(", ")} (added=${result.added.length} removed=${result.removed.length})`,
          );
        });
      },
    );

  station
    .command("status")
    .description("Show active profiles and registered components")
    .action(async (_opts: unknown, command: Command) => {
      await runGuarded(command, async () => {
        const ctx = buildCliContext(command);
        const session = await loadSession(ctx);

        console.log(`Session: ${session.id}`);
        console.log(`Active profiles: ${listOrNone(session.activeProfiles)}`);
        console.log("Components:");

        const components = session.registry.components();
        if (components.length === 0) {
          console.log("  (no components registered)");
          return;
        }
        printTable(
          ["Name", "Kind", "Unit"],
          components.map((component) => [component.name, component.kind, component.unit || "-"]),
        );
      });
    });
}

function listOrNone(names: string[]): string {
  return names.length > 0 ? names.join(", ") : "(none)";
}
