import { createLogger } from "@statbeacon/logger";
import type { MetricsState, StateStore, StoredState } from "../types.js";

const log = createLogger("metrics:state:memory");

/**
 * In-memory implementation of StateStore.
 *
 * Useful for unit tests and for hosts that keep their own configuration.
 * State is lost when the process exits.
 */
export class MemoryStateStore implements StateStore {
  private state: StoredState;

  constructor(initial: StoredState = {}) {
    this.state = { ...initial };
  }

  async load(): Promise<StoredState> {
    log.debug(`load: guid=${this.state.guid !== undefined} optOut=${this.state.optOut ?? "unset"}`);
    return { ...this.state };
  }

  async save(state: MetricsState): Promise<void> {
    this.state = { ...state };
    log.debug(`save: optOut=${state.optOut}`);
  }

  /** Change the stored opt-out flag the way an operator editing the backing store would. */
  setOptOut(optOut: boolean): void {
    this.state = { ...this.state, optOut };
  }
}
