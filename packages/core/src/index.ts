export {
  REPORT_BASE_URL,
  REPORT_PATH_TEMPLATE,
  PROTOCOL_REVISION,
  USER_AGENT,
  PING_INTERVAL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  FIRST_UPDATE_PHRASE,
  DEFAULT_PLOTTER_NAME,
  getReportUrl,
} from "./endpoints.js";

export type {
  ReportingConfig,
  ReportingConfigInput,
  PersistedStateDocument,
} from "./reporting-config.js";
export {
  reportingConfigSchema,
  loadReportingConfig,
  persistedStateSchema,
} from "./reporting-config.js";
