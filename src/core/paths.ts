import path from "node:path";

const RIG_HOME_DIR = ".rig";

export type RigPaths = {
  home: string;
  sessionStatePath: string;
  runStorePath: string;
  sessionLogPath: string;
};

/** RIG_HOME wins; otherwise state lives in .rig/ beside the config file. */
export function resolveRigHome(configPath: string, env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RIG_HOME?.trim();
  if (override) return path.resolve(override);
  return path.join(path.dirname(path.resolve(configPath)), RIG_HOME_DIR);
}

export function createRigPaths(home: string): RigPaths {
  return {
    home,
    sessionStatePath: path.join(home, "session.json"),
    runStorePath: path.join(home, "runs.json"),
    sessionLogPath: path.join(home, "logs", "session.jsonl"),
  };
}
