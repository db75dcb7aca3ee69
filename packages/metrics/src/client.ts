import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import {
  reportingConfigSchema,
  type ReportingConfig,
  type ReportingConfigInput,
} from "@statbeacon/core";
import { createLogger } from "@statbeacon/logger";
import { requireArg, type Graph } from "./graph.js";
import { GraphRegistry } from "./registry.js";
import { buildReport } from "./report-builder.js";
import { detectEnvironment } from "./environment.js";
import { HttpTransport } from "./transport.js";
import { SerialLock } from "./serial-lock.js";
import { intervalScheduler, type ScheduledTask, type Scheduler } from "./scheduler.js";
import { withDefaults } from "./state/document.js";
import type {
  EnvironmentFacts,
  HostMetadata,
  StateStore,
  StoredState,
  SubmitResult,
  Transport,
} from "./types.js";

const log = createLogger("metrics:client");

export interface MetricsClientOptions {
  host: HostMetadata;
  /** Where the id, opt-out and debug flags live */
  store: StateStore;
  /** Transport and scheduling settings; defaults from reportingConfigSchema */
  config?: ReportingConfigInput;
  /** Defaults to an HttpTransport built from `config` */
  transport?: Transport;
  /** Defaults to detectEnvironment, called on every tick */
  environment?: () => EnvironmentFacts;
  /** Defaults to intervalScheduler */
  scheduler?: Scheduler;
  registry?: GraphRegistry;
}

export interface MetricsClientEvents {
  submitted: [result: SubmitResult, plottersReset: number];
  failed: [error: Error];
  optedOut: [];
}

/** One scheduled reporting loop. Numbering of pings starts over with each task. */
interface ReportingTask {
  handle: ScheduledTask | null;
  /** A submission of this task has been accepted; later ones are pings */
  delivered: boolean;
  /** The tick currently running, if any */
  running: Promise<void> | null;
}

/**
 * Periodically reports host metadata, environment facts and plotter values
 * until the user opts out.
 *
 * At most one reporting task runs per client. `start`, `enable`, `disable`,
 * `isOptedOut` and each tick's opt-out check are serialized on one lock, so a
 * `disable()` racing a tick can never leave a task running or cancel one twice.
 * The opt-out flag is re-read from the store every time, so an operator can
 * flip it in the backing store while the host runs.
 */
export class MetricsClient extends EventEmitter<MetricsClientEvents> {
  readonly registry: GraphRegistry;
  private readonly host: HostMetadata;
  private readonly store: StateStore;
  private readonly transport: Transport;
  private readonly environment: () => EnvironmentFacts;
  private readonly scheduler: Scheduler;
  private readonly periodMs: number;
  private readonly guid: string;
  private readonly debug: boolean;
  private readonly optOutLock = new SerialLock();
  private task: ReportingTask | null = null;

  private constructor(
    options: MetricsClientOptions,
    config: ReportingConfig,
    state: { guid: string; debug: boolean },
  ) {
    super();
    this.host = options.host;
    this.store = options.store;
    this.guid = state.guid;
    this.debug = state.debug;
    this.registry = options.registry ?? new GraphRegistry();
    this.environment = options.environment ?? detectEnvironment;
    this.scheduler = options.scheduler ?? intervalScheduler;
    this.periodMs = config.pingIntervalMinutes * 60_000;
    this.transport =
      options.transport ?? new HttpTransport({ ...config, debug: state.debug });
  }

  /**
   * Load the persisted state and build a client. A store without an id gets
   * a freshly generated one, saved together with the default flags.
   * Throws when the store cannot be read or written.
   */
  static async create(options: MetricsClientOptions): Promise<MetricsClient> {
    requireArg(options, "Options cannot be null");
    const host = requireArg(options.host, "Host metadata cannot be null");
    requireArg(host.name, "Application name cannot be null");
    requireArg(options.store, "State store cannot be null");

    const config = reportingConfigSchema.parse(options.config ?? {});
    const stored = await options.store.load();
    const state = withDefaults(stored, randomUUID());
    if (stored.guid === undefined) {
      await options.store.save(state);
      log.info(`Generated reporting id for ${host.name}`);
    }

    return new MetricsClient(options, config, state);
  }

  getGuid(): string {
    return this.guid;
  }

  isDebug(): boolean {
    return this.debug;
  }

  /** Whether a reporting task is scheduled. */
  isRunning(): boolean {
    return this.task !== null;
  }

  createGraph(name: string): Graph {
    return this.registry.createGraph(name);
  }

  addGraph(graph: Graph): Graph {
    return this.registry.addGraph(graph);
  }

  getGraphs(): Graph[] {
    return this.registry.getGraphs();
  }

  /**
   * Start reporting: one submission right away, then one every ping interval.
   * @returns false when opted out, true when a task is (already) running
   */
  start(): Promise<boolean> {
    return this.optOutLock.run(() => this.startLocked());
  }

  /** Re-read the opt-out flag. An unreadable store counts as opted out. */
  isOptedOut(): Promise<boolean> {
    return this.optOutLock.run(() => this.readOptOut());
  }

  /** Clear the opt-out flag if set, and start reporting if stopped. */
  enable(): Promise<void> {
    return this.optOutLock.run(async () => {
      if (await this.readOptOut()) {
        await this.persistOptOut(false);
      }
      if (this.task === null) {
        await this.startLocked();
      }
    });
  }

  /** Set the opt-out flag if clear, and stop reporting if running. */
  disable(): Promise<void> {
    return this.optOutLock.run(async () => {
      if (!(await this.readOptOut())) {
        await this.persistOptOut(true);
      }
      this.cancelTask();
    });
  }

  /**
   * Stop reporting without touching the opt-out flag and wait for a
   * submission in flight. Releases the transport.
   */
  async shutdown(): Promise<void> {
    const task = await this.optOutLock.run(() => {
      const current = this.task;
      this.cancelTask();
      return current;
    });
    await task?.running;
    await this.transport.close?.();
  }

  private async startLocked(): Promise<boolean> {
    if (await this.readOptOut()) {
      return false;
    }
    if (this.task !== null) {
      return true;
    }

    const task: ReportingTask = { handle: null, delivered: false, running: null };
    this.task = task;
    task.handle = this.scheduler.scheduleRepeating(() => this.tick(task), this.periodMs);
    log.debug(`Reporting every ${this.periodMs}ms`);
    return true;
  }

  private cancelTask(): void {
    if (this.task === null) {
      return;
    }
    this.task.handle?.cancel();
    this.task = null;
  }

  private async readOptOut(): Promise<boolean> {
    try {
      const stored = await this.store.load();
      return stored.optOut ?? false;
    } catch (err) {
      if (this.debug) {
        log.info(`[Metrics] ${err instanceof Error ? err.message : String(err)}`);
      }
      return true;
    }
  }

  private async persistOptOut(optOut: boolean): Promise<void> {
    let stored: StoredState = {};
    try {
      stored = await this.store.load();
    } catch (err) {
      log.warn("Reporting state unreadable; rewriting it", err);
    }
    await this.store.save({
      ...withDefaults(stored, this.guid),
      guid: this.guid,
      optOut,
    });
  }

  private tick(task: ReportingTask): Promise<void> {
    if (task.running !== null) {
      log.debug("Previous submission still running; skipping tick");
      return task.running;
    }
    const running = this.runTick(task)
      .catch((err) => {
        log.error("Reporting tick failed", err);
      })
      .finally(() => {
        task.running = null;
      });
    task.running = running;
    return running;
  }

  /** Check-and-cancel under the lock, then one submission whatever the outcome. */
  private async runTick(task: ReportingTask): Promise<void> {
    await this.optOutLock.run(async () => {
      if (this.task !== task) {
        return;
      }
      if (await this.readOptOut()) {
        this.cancelTask();
        this.registry.notifyOptOut();
        log.info("Opted out; reporting stopped");
        this.emit("optedOut");
      }
    });

    await this.submit(task);
  }

  private async submit(task: ReportingTask): Promise<void> {
    try {
      const document = await buildReport({
        guid: this.guid,
        host: this.host,
        environment: this.environment(),
        graphs: this.registry.getGraphs(),
        ping: task.delivered,
      });
      const result = await this.transport.submit(this.host.name, document);
      task.delivered = true;

      const plottersReset = result.firstUpdate ? await this.registry.resetPlotters() : 0;
      this.emit("submitted", result, plottersReset);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (this.debug) {
        log.info(`[Metrics] ${error.message}`);
      }
      this.emit("failed", error);
    }
  }
}
