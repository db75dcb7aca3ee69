import { persistedStateSchema, type PersistedStateDocument } from "@statbeacon/core";
import type { MetricsState, StoredState } from "../types.js";

/** Validate a parsed document and map its keys onto {@link StoredState}. Throws a ZodError when invalid. */
export function fromDocument(raw: unknown): StoredState {
  const doc = persistedStateSchema.parse(raw);
  const state: StoredState = {};
  if (doc.guid !== undefined) state.guid = doc.guid;
  if (doc["opt-out"] !== undefined) state.optOut = doc["opt-out"];
  if (doc.debug !== undefined) state.debug = doc.debug;
  return state;
}

export function toDocument(state: MetricsState): PersistedStateDocument {
  return {
    guid: state.guid,
    "opt-out": state.optOut,
    debug: state.debug,
  };
}

/** Apply defaults to a stored state. `guid` is only used when none is stored. */
export function withDefaults(stored: StoredState, guid: string): MetricsState {
  return {
    guid: stored.guid ?? guid,
    optOut: stored.optOut ?? false,
    debug: stored.debug ?? false,
  };
}
