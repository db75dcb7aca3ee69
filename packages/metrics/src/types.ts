/**
 * Identity and live figures of the host application, read on every tick.
 */
export interface HostMetadata {
  /** Application name, used in the submission URL. */
  name: string;

  /** Application version (e.g., "2.4.1") */
  version: string;

  /** Version of the environment the application runs in (e.g., the server build) */
  environmentVersion: string;

  /** Live gauge such as the number of connected users */
  getActiveCount(): number;

  /** Whether the host authenticates its users */
  isAuthMode(): boolean;
}

/**
 * Facts about the machine and runtime. See `detectEnvironment`.
 */
export interface EnvironmentFacts {
  osName: string;
  osArch: string;
  osVersion: string;
  runtimeVersion: string;
  cpuCount: number;
}

/** The three persisted fields. */
export interface MetricsState {
  /** Stable random identifier, generated once */
  guid: string;
  /** When true, no reporting happens */
  optOut: boolean;
  /** When true, delivery failures are logged */
  debug: boolean;
}

/** What a store holds before the first save. */
export type StoredState = Partial<MetricsState>;

/**
 * Backing store for {@link MetricsState}.
 *
 * `load` throws when the store is unreadable or corrupt; an empty store
 * resolves to `{}`.
 */
export interface StateStore {
  load(): Promise<StoredState>;
  save(state: MetricsState): Promise<void>;
}

/** Outcome of an accepted submission. */
export interface SubmitResult {
  /** First line of the response body */
  response: string;
  /** The service accepted this as the first update of its aggregation window */
  firstUpdate: boolean;
}

/**
 * Delivers a report document. Rejects with a DeliveryError when the service
 * refuses the report or cannot be reached.
 */
export interface Transport {
  submit(applicationName: string, document: string): Promise<SubmitResult>;
  /** Release network resources; called when the client shuts down */
  close?(): Promise<void>;
}
