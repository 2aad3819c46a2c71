import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseRigConfig } from "../core/config-loader.js";
import { ConfigError } from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";

import { SessionStateStore, restoreSession, snapshotSession } from "./session-store.js";
import { applyProfiles, createMeasurementSession, getParameter } from "./session.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeStatePath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rig-session-"));
  tempDirs.push(dir);
  return path.join(dir, "session.json");
}

const config = parseRigConfig(
  {
    station: { verbose: false },
    instruments: [{ name: "cryostat" }],
    parameters: [{ name: "description" }],
    profiles: { cooldown: ["cryostat", "description"] },
  },
  {},
);

describe("SessionStateStore", () => {
  it("saves and restores registry contents and parameter state", async () => {
    const store = new SessionStateStore(makeStatePath());
    const session = createMeasurementSession(config, { sessionId: "test-session" });
    applyProfiles(session, ["cooldown"]);
    getParameter(session, "description").set("sweep 1");
    getParameter(session, "description").get();
    await store.save(session);

    const state = await store.load();
    expect(state).not.toBeNull();
    if (!state) return;
    const restored = restoreSession(config, state);

    expect(restored.id).toBe("test-session");
    expect(restored.registry.componentNames()).toEqual(["cryostat", "description"]);
    expect(restored.activeProfiles).toEqual(["cooldown"]);
    const description = getParameter(restored, "description");
    expect(description.peek()).toBe("sweep 1");
    expect(description.isConsumed).toBe(false);
    expect(() => description.get()).toThrow("description was already read since it was last set.");
  });

  it("returns null when nothing was saved and clears saved state", async () => {
    const store = new SessionStateStore(makeStatePath());

    expect(await store.load()).toBeNull();
    expect(await store.clear()).toBe(false);

    await store.save(createMeasurementSession(config));
    expect(await store.clear()).toBe(true);
    expect(await store.exists()).toBe(false);
  });

  it("rejects malformed state", async () => {
    const filePath = makeStatePath();
    fs.writeFileSync(filePath, JSON.stringify({ version: 99 }), "utf8");

    await expect(new SessionStateStore(filePath).load()).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("restoreSession", () => {
  it("skips saved components the config no longer declares", () => {
    const session = createMeasurementSession(config, { sessionId: "test-session" });
    applyProfiles(session, ["cooldown"]);
    const state = { ...snapshotSession(session), registered: ["cryostat", "magnet"] };
    const logger = new MemoryLogger();

    const restored = restoreSession(config, state, { logger });

    expect(restored.registry.componentNames()).toEqual(["cryostat"]);
    expect(logger.ofType("session.restore_skipped")).toEqual([
      { type: "session.restore_skipped", payload: { component: "magnet" } },
    ]);
  });
});
