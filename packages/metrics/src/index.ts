export { MetricsClient } from "./client.js";
export type { MetricsClientOptions, MetricsClientEvents } from "./client.js";
export { Graph, Plotter, createPlotter } from "./graph.js";
export type { GraphOptions } from "./graph.js";
export { GraphRegistry } from "./registry.js";
export { buildReport } from "./report-builder.js";
export type { ReportInput } from "./report-builder.js";
export { escapeJson, isNumericLiteral, jsonPair, JsonObjectBuilder } from "./json.js";
export { detectEnvironment, normalizeArch } from "./environment.js";
export {
  HttpTransport,
  gzip,
  encodeFormComponent,
  readFirstLine,
  interpretResponse,
} from "./transport.js";
export type { HttpTransportOptions } from "./transport.js";
export { DeliveryError } from "./errors.js";
export { SerialLock } from "./serial-lock.js";
export { intervalScheduler } from "./scheduler.js";
export type { Scheduler, ScheduledTask } from "./scheduler.js";
export {
  MemoryStateStore,
  FileStateStore,
  SettingsStateStore,
  createStateStore,
  DEFAULT_STATE_PATH,
} from "./state/index.js";
export type { StateStoreOptions } from "./state/index.js";
export type {
  HostMetadata,
  EnvironmentFacts,
  MetricsState,
  StoredState,
  StateStore,
  SubmitResult,
  Transport,
} from "./types.js";
