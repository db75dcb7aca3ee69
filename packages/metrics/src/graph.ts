import { DEFAULT_PLOTTER_NAME } from "@statbeacon/core";

/** Throws for null/undefined arguments passed by untyped callers. */
export function requireArg<T>(value: T | null | undefined, message: string): T {
  if (value === null || value === undefined) {
    throw new TypeError(message);
  }
  return value;
}

/**
 * A named, polled integer data source. One plotter is one series on a graph.
 *
 * `getValue` may be slow or asynchronous, and it is called from the reporting
 * tick, so implementations guard any shared state they read.
 */
export abstract class Plotter {
  readonly name: string;

  constructor(name: string = DEFAULT_PLOTTER_NAME) {
    this.name = requireArg(name, "Plotter name cannot be null");
  }

  abstract getValue(): number | Promise<number>;

  /** Column name the value is reported under. */
  getColumnName(): string {
    return this.name;
  }

  /** Called after the collection service accepted the first update of its window. */
  reset(): void | Promise<void> {}
}

/** Build a plotter from plain functions. */
export function createPlotter(
  name: string,
  getValue: () => number | Promise<number>,
  reset?: () => void | Promise<void>,
): Plotter {
  return new (class extends Plotter {
    getValue(): number | Promise<number> {
      return getValue();
    }

    reset(): void | Promise<void> {
      return reset?.();
    }
  })(name);
}

export interface GraphOptions {
  /** Called when the owning client stops because the user opted out. */
  onOptOut?: () => void;
}

/**
 * A named group of plotters, drawn as one chart by the collection service.
 * Graphs are identified by name; plotters inside a graph by column name.
 */
export class Graph {
  readonly name: string;
  private readonly plotters = new Map<string, Plotter>();
  private readonly optOutListener: (() => void) | undefined;

  constructor(name: string, options: GraphOptions = {}) {
    this.name = requireArg(name, "Graph name cannot be null");
    this.optOutListener = options.onOptOut;
  }

  /**
   * Add a plotter. A plotter whose column name is already present is ignored.
   * @returns whether the plotter was added
   */
  addPlotter(plotter: Plotter): boolean {
    requireArg(plotter, "Plotter cannot be null");
    const column = plotter.getColumnName();
    if (this.plotters.has(column)) {
      return false;
    }
    this.plotters.set(column, plotter);
    return true;
  }

  /** Remove the plotter if it is the one registered under its column name. */
  removePlotter(plotter: Plotter): boolean {
    requireArg(plotter, "Plotter cannot be null");
    const column = plotter.getColumnName();
    if (this.plotters.get(column) !== plotter) {
      return false;
    }
    return this.plotters.delete(column);
  }

  /** Snapshot of the plotters in insertion order. */
  getPlotters(): Plotter[] {
    return [...this.plotters.values()];
  }

  onOptOut(): void {
    this.optOutListener?.();
  }
}
