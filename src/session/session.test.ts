import { describe, expect, it } from "vitest";

import { parseRigConfig } from "../core/config-loader.js";
import { StaleParameterError, UnknownParameterError } from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";
import { MustUpdateParameter } from "../parameters/must-update-parameter.js";

import { applyProfiles, beginMeasurement, createMeasurementSession, getParameter } from "./session.js";

const config = parseRigConfig(
  {
    station: { verbose: false },
    instruments: [{ name: "cryostat" }, { name: "lockin" }],
    parameters: [
      { name: "description", strict: false },
      { name: "bias", unit: "mV" },
    ],
    profiles: {
      cooldown: ["cryostat", "description"],
      transport: ["lockin", "description", "bias"],
    },
  },
  {},
);

describe("createMeasurementSession", () => {
  it("builds one component object per configured name", () => {
    const session = createMeasurementSession(config, { sessionId: "test-session" });

    expect(session.id).toBe("test-session");
    expect([...session.components.keys()]).toEqual(["cryostat", "lockin", "description", "bias"]);
    expect(session.station.profileMembers("transport")[1]).toBe(session.parameters.get("description"));
    expect(getParameter(session, "bias")).toBeInstanceOf(MustUpdateParameter);
    expect(getParameter(session, "bias").unit).toBe("mV");
  });

  it("fails for unknown parameters", () => {
    const session = createMeasurementSession(config);

    expect(() => getParameter(session, "gate")).toThrow(UnknownParameterError);
  });
});

describe("applyProfiles", () => {
  it("reconciles the station and remembers the active profiles", () => {
    const session = createMeasurementSession(config);

    applyProfiles(session, ["cooldown"]);
    const result = applyProfiles(session, ["transport"]);

    expect(result.removed).toEqual(["cryostat"]);
    expect(result.added).toEqual(["lockin", "bias"]);
    expect(session.registry.componentNames()).toEqual(["description", "lockin", "bias"]);
    expect(session.activeProfiles).toEqual(["transport"]);
  });
});

describe("beginMeasurement", () => {
  it("claims every registered parameter and returns their values", () => {
    const logger = new MemoryLogger();
    const session = createMeasurementSession(config, { logger });
    applyProfiles(session, ["transport"]);
    getParameter(session, "description").set("IV curve");
    getParameter(session, "bias").set(10);

    const values = beginMeasurement(session);

    expect(values).toEqual({ description: "IV curve", bias: 10 });
    expect(logger.ofType("measurement.begin")).toEqual([
      { type: "measurement.begin", payload: { parameters: ["description", "bias"] } },
    ]);
  });

  it("requires a new value before the next measurement", () => {
    const session = createMeasurementSession(config);
    applyProfiles(session, ["cooldown"]);
    getParameter(session, "description").set("first cooldown");
    beginMeasurement(session);

    expect(() => beginMeasurement(session)).toThrow(StaleParameterError);

    getParameter(session, "description").set("second cooldown");
    expect(beginMeasurement(session)).toEqual({ description: "second cooldown" });
  });

  it("ignores configured parameters that are not registered", () => {
    const session = createMeasurementSession(config);
    applyProfiles(session, ["cooldown"]);
    getParameter(session, "description").set("only this");

    expect(beginMeasurement(session)).toEqual({ description: "only this" });
    expect(getParameter(session, "bias").isConsumed).toBe(true);
  });

  it("sweeps an explicit parameter list", () => {
    const session = createMeasurementSession(config);
    getParameter(session, "bias").set(1);

    expect(beginMeasurement(session, { parameters: ["bias"] })).toEqual({ bias: 1 });
  });
});
