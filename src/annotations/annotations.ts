/*
Purpose: attach post-measurement annotations, error flags and extra metadata to recorded runs.
Assumptions: the run metadata store owns persistence; this module only decides which keys to write.
Usage: await annotateRuns(store, [12, 13], { annotation: "bad thermometer", errorState: true });
*/

import { logSessionEvent, type EventLogger, type JsonObject, type JsonValue } from "../core/logger.js";

// =============================================================================
// KEYS
// =============================================================================

export const ANNOTATION_KEY = "post_measurement_annotation";
export const ERROR_KEY = "errors_in_measurement";
export const INSPECTOR_TAG_KEY = "inspectr_tag";
export const INSPECTOR_CROSS = "cross";
export const ADDITIONAL_ANNOTATION_SEPARATOR = "\nADDITIONAL ANNOTATION: \n";

// =============================================================================
// TYPES
// =============================================================================

export interface RunMetadataStore {
  getMetadata(runId: number): Promise<JsonObject>;
  addMetadata(runId: number, key: string, value: JsonValue): Promise<void>;
}

export type AnnotationOptions = {
  annotation?: string;
  errorState?: boolean;
  otherMetadata?: JsonObject;
  /** Tag error runs with a cross in the data inspector. Default true. */
  flagInInspector?: boolean;
  logger?: EventLogger;
};

// =============================================================================
// OPERATIONS
// =============================================================================

/** Overwrites the annotation of each run. */
export async function annotateRuns(
  store: RunMetadataStore,
  runIds: number | readonly number[],
  options: AnnotationOptions,
): Promise<void> {
  for (const runId of toRunIdList(runIds)) {
    if (options.annotation !== undefined) {
      await store.addMetadata(runId, ANNOTATION_KEY, options.annotation);
    }
    await writeSharedMetadata(store, runId, options);
    logAnnotation(options, runId, "overwrite");
  }
}

/** Appends to any existing annotation instead of replacing it. */
export async function appendAnnotation(
  store: RunMetadataStore,
  runIds: number | readonly number[],
  options: AnnotationOptions,
): Promise<void> {
  for (const runId of toRunIdList(runIds)) {
    const metadata = await store.getMetadata(runId);
    const combined = combineAnnotations(metadata[ANNOTATION_KEY], options.annotation);
    if (combined !== undefined) {
      await store.addMetadata(runId, ANNOTATION_KEY, combined);
    }
    await writeSharedMetadata(store, runId, options);
    logAnnotation(options, runId, "append");
  }
}

export function combineAnnotations(
  existing: JsonValue | undefined,
  annotation: string | undefined,
): string | undefined {
  const previous = typeof existing === "string" ? existing : undefined;
  if (previous === undefined) return annotation;
  if (annotation === undefined) return previous;
  return `${previous}${ADDITIONAL_ANNOTATION_SEPARATOR}${annotation}`;
}

// =============================================================================
// HELPERS
// =============================================================================

async function writeSharedMetadata(
  store: RunMetadataStore,
  runId: number,
  options: AnnotationOptions,
): Promise<void> {
  if (options.errorState !== undefined) {
    await store.addMetadata(runId, ERROR_KEY, options.errorState);
    if ((options.flagInInspector ?? true) && options.errorState) {
      await store.addMetadata(runId, INSPECTOR_TAG_KEY, INSPECTOR_CROSS);
    }
  }

  for (const [key, value] of Object.entries(options.otherMetadata ?? {})) {
    await store.addMetadata(runId, key, value);
  }
}

function toRunIdList(runIds: number | readonly number[]): readonly number[] {
  return typeof runIds === "number" ? [runIds] : runIds;
}

function logAnnotation(options: AnnotationOptions, runId: number, mode: "overwrite" | "append"): void {
  logSessionEvent(options.logger, "annotation.write", {
    run_id: runId,
    mode,
    annotation: options.annotation ?? null,
    error_state: options.errorState ?? null,
    extra_keys: Object.keys(options.otherMetadata ?? {}),
  });
}
