/*
Purpose: error types raised by the station, parameter and annotation modules, plus the CLI-facing wrapper.
Assumptions: UserFacingError instances are safe to display to operators.
Usage: throw new StaleReadError(name); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class RigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RigError";
  }
}

export class ConfigError extends RigError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

// =============================================================================
// STATION ERRORS
// =============================================================================

export class StationError extends RigError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StationError";
  }
}

export class UntrackedComponentError extends StationError {
  constructor(public readonly componentName: string) {
    super(
      `A component, ${componentName}, exists in the station which is not in the list of ` +
        "components used for the measurement, nor in the list of components NOT used for the measurement.",
    );
    this.name = "UntrackedComponentError";
  }
}

export class UnknownProfileError extends StationError {
  constructor(
    public readonly profileName: string,
    public readonly knownProfiles: string[],
  ) {
    super(
      `Unknown profile "${profileName}". Known profiles: ${
        knownProfiles.length > 0 ? knownProfiles.join(", ") : "(none)"
      }.`,
    );
    this.name = "UnknownProfileError";
  }
}

export class ConflictingComponentError extends StationError {
  constructor(
    public readonly componentName: string,
    public readonly profileName: string,
  ) {
    super(
      `Profile "${profileName}" references a different component object named "${componentName}" ` +
        "than an earlier profile. Each component name must map to one object.",
    );
    this.name = "ConflictingComponentError";
  }
}

export class DuplicateComponentError extends StationError {
  constructor(public readonly componentName: string) {
    super(`A different component named "${componentName}" is already registered.`);
    this.name = "DuplicateComponentError";
  }
}

export class ComponentNotFoundError extends StationError {
  constructor(public readonly componentName: string) {
    super(`No component named "${componentName}" is registered.`);
    this.name = "ComponentNotFoundError";
  }
}

// =============================================================================
// PARAMETER ERRORS
// =============================================================================

export class ParameterError extends RigError {
  constructor(
    message: string,
    public readonly parameterName: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ParameterError";
  }
}

export class NonDistinctValueError extends ParameterError {
  constructor(parameterName: string) {
    super(`New value of ${parameterName} must differ from the previous one.`, parameterName);
    this.name = "NonDistinctValueError";
  }
}

export class StaleReadError extends ParameterError {
  constructor(parameterName: string) {
    super(
      `${parameterName} was already read since it was last set. Set a new value before reading it again.`,
      parameterName,
    );
    this.name = "StaleReadError";
  }
}

export class StaleParameterError extends ParameterError {
  constructor(
    parameterName: string,
    public readonly value: unknown,
    public readonly unit: string,
  ) {
    const unitSuffix = unit ? ` ${unit}` : "";
    super(
      `Parameter ${parameterName} (current value: ${describeValue(value)}${unitSuffix}) ` +
        "was not updated since the last measurement.",
      parameterName,
    );
    this.name = "StaleParameterError";
  }
}

export class UnknownParameterError extends ParameterError {
  constructor(parameterName: string) {
    super(`No must-update parameter named "${parameterName}" is configured.`, parameterName);
    this.name = "UnknownParameterError";
  }
}

// =============================================================================
// ANNOTATION ERRORS
// =============================================================================

export class AnnotationError extends RigError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "AnnotationError";
  }
}

export class RunNotFoundError extends AnnotationError {
  constructor(public readonly runId: number) {
    super(`Run ${runId} does not exist in the run metadata store.`);
    this.name = "RunNotFoundError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  station: "STATION_ERROR",
  parameter: "PARAMETER_ERROR",
  annotation: "ANNOTATION_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError | undefined {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof UntrackedComponentError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.station,
      title: "Station has an untracked component.",
      message: error.message,
      hint: `Add ${error.componentName} to a profile, or set station.untracked_components to "warn".`,
      cause: error,
    });
  }

  if (error instanceof StationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.station,
      title: "Station reconfiguration failed.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof StaleParameterError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.parameter,
      title: "Parameter not updated since the last measurement.",
      message: error.message,
      hint: `Set a new value with: rig param set ${error.parameterName} <value>`,
      next: "Then start the measurement again.",
      cause: error,
    });
  }

  if (error instanceof ParameterError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.parameter,
      title: "Parameter update rejected.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof AnnotationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.annotation,
      title: "Annotation failed.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Rig config invalid.",
      message: error.message,
      hint: "Check rig.yaml or pass --config <path>.",
      cause: error,
    });
  }

  return undefined;
}

function describeValue(value: unknown): string {
  if (value === undefined) return "<unset>";
  if (typeof value === "string") return JSON.stringify(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
