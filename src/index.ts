import { buildCli } from "./cli/index.js";

export async function main(argv: string[]): Promise<void> {
  await buildCli().parseAsync(argv);
}

export { buildCli };
export * from "./annotations/annotations.js";
export { JsonRunMetadataStore } from "./annotations/run-store.js";
export * from "./core/config.js";
export { loadRigConfig, parseRigConfig } from "./core/config-loader.js";
export * from "./core/errors.js";
export { JsonlLogger, MemoryLogger, type EventLogger } from "./core/logger.js";
export { checkParametersUpdated, type RegistrySource } from "./parameters/check-updated.js";
export * from "./parameters/must-update-parameter.js";
export * from "./session/session.js";
export * from "./session/session-store.js";
export * from "./station/component.js";
export * from "./station/dynamic-station.js";
export { InMemoryComponentRegistry } from "./station/registry.js";
