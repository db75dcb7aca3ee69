// Collection service
export const REPORT_BASE_URL = "http://report.mcstats.org";
/** `%s` is replaced by the form-encoded application name. */
export const REPORT_PATH_TEMPLATE = "/plugin/%s";

/** Protocol revision sent in the User-Agent. The endpoint keys its parser on it. */
export const PROTOCOL_REVISION = 7;
export const USER_AGENT = `MCStats/${PROTOCOL_REVISION}`;

/** Minutes between submissions. */
export const PING_INTERVAL = 1;

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/** Response phrase marking the first accepted update of the aggregation window. */
export const FIRST_UPDATE_PHRASE = "This is your first update this hour";

/** Column name given to plotters created without one. */
export const DEFAULT_PLOTTER_NAME = "Default";

/** Resolve the submission URL for the given base and path template. */
export function getReportUrl(
	encodedName: string,
	baseUrl: string = REPORT_BASE_URL,
	pathTemplate: string = REPORT_PATH_TEMPLATE,
): string {
	return `${baseUrl.replace(/\/+$/, "")}${pathTemplate.replace("%s", encodedName)}`;
}
