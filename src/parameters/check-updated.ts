import { StaleParameterError } from "../core/errors.js";
import { logSessionEvent, toJsonValue, type EventLogger } from "../core/logger.js";
import type { ComponentRegistry } from "../station/component.js";

import { isMustUpdateParameter, type MustUpdateParameter } from "./must-update-parameter.js";

/** Anything that can hand over its registry; a MeasurementSession satisfies this. */
export type RegistrySource = {
  readonly registry: ComponentRegistry;
};

export type CheckParametersOptions = {
  verbose?: boolean;
  logger?: EventLogger;
  print?: (line: string) => void;
};

/**
 * Claims every parameter for the measurement that is about to start.
 *
 * Fails fast on the first parameter whose value was already consumed. Parameters
 * claimed before the failure stay claimed; the caller aborts and retries the
 * whole measurement.
 */
export function checkParametersUpdated(
  target: Iterable<MustUpdateParameter> | RegistrySource,
  options: CheckParametersOptions = {},
): MustUpdateParameter[] {
  const verbose = options.verbose ?? true;
  const print = options.print ?? ((line: string) => console.log(line));
  const parameters = resolveParameters(target);
  const claimed: MustUpdateParameter[] = [];

  for (const parameter of parameters) {
    if (parameter.isConsumed) {
      logSessionEvent(options.logger, "measurement.stale_parameter", {
        parameter: parameter.name,
        value: toJsonValue(parameter.peek()),
        unit: parameter.unit,
      });
      throw new StaleParameterError(parameter.name, parameter.peek(), parameter.unit);
    }

    parameter.markConsumed();
    claimed.push(parameter);

    if (verbose) {
      const unit = parameter.unit ? ` ${parameter.unit}` : "";
      print(`${parameter.label}: ${JSON.stringify(toJsonValue(parameter.peek()))}${unit}`);
    }
  }

  logSessionEvent(options.logger, "measurement.begin", {
    parameters: claimed.map((parameter) => parameter.name),
  });

  return claimed;
}

function resolveParameters(
  target: Iterable<MustUpdateParameter> | RegistrySource,
): MustUpdateParameter[] {
  if (isRegistrySource(target)) {
    return target.registry.components().filter(isMustUpdateParameter);
  }
  return [...target];
}

function isRegistrySource(
  target: Iterable<MustUpdateParameter> | RegistrySource,
): target is RegistrySource {
  return "registry" in target;
}
