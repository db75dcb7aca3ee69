import type { Graph } from "./graph.js";
import { JsonObjectBuilder } from "./json.js";
import { normalizeArch } from "./environment.js";
import type { EnvironmentFacts, HostMetadata } from "./types.js";

export interface ReportInput {
  guid: string;
  host: HostMetadata;
  environment: EnvironmentFacts;
  /** Graphs to report; an empty list omits the `graphs` member */
  graphs: readonly Graph[];
  /** Marks every submission after the first of a reporting task */
  ping: boolean;
}

/**
 * Serialize one report document.
 *
 * Plotter membership is captured before any value is read, so the awaits on
 * slow plotters cannot interleave with graph mutations from the host.
 */
export async function buildReport(input: ReportInput): Promise<string> {
  const { guid, host, environment, ping } = input;
  const snapshot = input.graphs.map((graph) => ({
    name: graph.name,
    plotters: graph.getPlotters(),
  }));

  const json = new JsonObjectBuilder()
    .pair("guid", guid)
    .pair("plugin_version", host.version)
    .pair("server_version", host.environmentVersion)
    .pair("players_online", String(host.getActiveCount()))
    .pair("osname", environment.osName)
    .pair("osarch", normalizeArch(environment.osArch))
    .pair("osversion", environment.osVersion)
    .pair("cores", String(environment.cpuCount))
    .pair("auth_mode", host.isAuthMode() ? "1" : "0")
    .pair("runtime_version", environment.runtimeVersion);

  if (ping) {
    json.pair("ping", "1");
  }

  if (snapshot.length > 0) {
    const graphs = new JsonObjectBuilder();
    for (const graph of snapshot) {
      const columns = new JsonObjectBuilder();
      for (const plotter of graph.plotters) {
        const value = Math.trunc(await plotter.getValue());
        columns.pair(plotter.getColumnName(), String(value));
      }
      graphs.raw(graph.name, columns.toString());
    }
    json.raw("graphs", graphs.toString());
  }

  return json.toString();
}
