import { z } from "zod";
import type { SettingsRepository } from "@statbeacon/storage";
import type { MetricsState, StateStore, StoredState } from "../types.js";

const booleanText = z.enum(["true", "false"]).transform((value) => value === "true");

const settingsSchema = z.object({
  guid: z.string().min(1).optional(),
  "opt-out": booleanText.optional(),
  debug: booleanText.optional(),
});

/** Keeps the reporting state in the SQLite settings table under a key prefix. */
export class SettingsStateStore implements StateStore {
  constructor(
    private readonly settings: SettingsRepository,
    private readonly prefix = "metrics.",
  ) {}

  async load(): Promise<StoredState> {
    const values = settingsSchema.parse(this.settings.getByPrefix(this.prefix));
    const state: StoredState = {};
    if (values.guid !== undefined) state.guid = values.guid;
    if (values["opt-out"] !== undefined) state.optOut = values["opt-out"];
    if (values.debug !== undefined) state.debug = values.debug;
    return state;
  }

  async save(state: MetricsState): Promise<void> {
    this.settings.setMany({
      [`${this.prefix}guid`]: state.guid,
      [`${this.prefix}opt-out`]: String(state.optOut),
      [`${this.prefix}debug`]: String(state.debug),
    });
  }
}
