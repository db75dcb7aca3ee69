import { createLogger } from "@statbeacon/logger";
import { Graph, requireArg } from "./graph.js";

const log = createLogger("metrics:registry");

/**
 * The set of graphs a client reports, keyed by graph name.
 *
 * Membership changes and snapshots are synchronous, so a reporting tick that
 * snapshots the graphs never observes a half-applied add or remove.
 */
export class GraphRegistry {
  private readonly graphs = new Map<string, Graph>();

  get size(): number {
    return this.graphs.size;
  }

  /** Create and register a graph, or return the one already registered under `name`. */
  createGraph(name: string): Graph {
    requireArg(name, "Graph name cannot be null");
    return this.addGraph(new Graph(name));
  }

  /**
   * Register a graph. When a graph with the same name is already present the
   * existing one is kept and returned.
   */
  addGraph(graph: Graph): Graph {
    requireArg(graph, "Graph cannot be null");
    const existing = this.graphs.get(graph.name);
    if (existing) {
      return existing;
    }
    this.graphs.set(graph.name, graph);
    return graph;
  }

  removeGraph(graph: Graph): boolean {
    requireArg(graph, "Graph cannot be null");
    if (this.graphs.get(graph.name) !== graph) {
      return false;
    }
    return this.graphs.delete(graph.name);
  }

  getGraph(name: string): Graph | undefined {
    return this.graphs.get(name);
  }

  /** Snapshot of the registered graphs in insertion order. */
  getGraphs(): Graph[] {
    return [...this.graphs.values()];
  }

  /** Tell every graph that reporting stopped because of an opt-out. */
  notifyOptOut(): void {
    for (const graph of this.getGraphs()) {
      try {
        graph.onOptOut();
      } catch (err) {
        log.warn(`onOptOut hook of graph "${graph.name}" failed`, err);
      }
    }
  }

  /**
   * Reset every plotter of every graph once.
   * @returns the number of plotters reset
   */
  async resetPlotters(): Promise<number> {
    const plotters = this.getGraphs().flatMap((graph) => graph.getPlotters());
    let count = 0;
    for (const plotter of plotters) {
      try {
        await plotter.reset();
        count++;
      } catch (err) {
        log.warn(`reset of plotter "${plotter.getColumnName()}" failed`, err);
      }
    }
    return count;
  }
}
