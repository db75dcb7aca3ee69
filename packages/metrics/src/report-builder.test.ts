import { describe, it, expect } from "vitest";
import { buildReport, type ReportInput } from "./report-builder.js";
import { Graph, createPlotter } from "./graph.js";
import { detectEnvironment, normalizeArch } from "./environment.js";
import type { EnvironmentFacts, HostMetadata } from "./types.js";

const host: HostMetadata = {
  name: "Demo",
  version: "1.2",
  environmentVersion: "build-77 (core 3.1)",
  getActiveCount: () => 5,
  isAuthMode: () => true,
};

const environment: EnvironmentFacts = {
  osName: "Linux",
  osArch: "amd64",
  osVersion: "6.1.0",
  runtimeVersion: "v20.11.1",
  cpuCount: 8,
};

const BASE =
  '{"guid":"test-guid","plugin_version":1.2,"server_version":"build-77 (core 3.1)",' +
  '"players_online":5,"osname":"Linux","osarch":"x86_64","osversion":"6.1.0",' +
  '"cores":8,"auth_mode":1,"runtime_version":"v20.11.1"';

function input(overrides: Partial<ReportInput> = {}): ReportInput {
  return { guid: "test-guid", host, environment, graphs: [], ping: false, ...overrides };
}

describe("buildReport", () => {
  it("writes the host and environment members in order", async () => {
    expect(await buildReport(input())).toBe(BASE + "}");
  });

  it("adds the ping marker", async () => {
    expect(await buildReport(input({ ping: true }))).toBe(BASE + ',"ping":1}');
  });

  it("reports auth mode off as 0", async () => {
    const json = await buildReport(input({ host: { ...host, isAuthMode: () => false } }));
    expect(json).toContain('"auth_mode":0,');
  });

  it("nests graph values under graphs", async () => {
    const usage = new Graph("Usage");
    usage.addPlotter(createPlotter("Players", () => 5));
    const json = await buildReport(input({ graphs: [usage] }));
    expect(json).toBe(BASE + ',"graphs":{"Usage":{"Players":5}}}');
  });

  it("places graphs after the ping marker", async () => {
    const usage = new Graph("Usage");
    usage.addPlotter(createPlotter("Players", () => 5));
    const json = await buildReport(input({ graphs: [usage], ping: true }));
    expect(json).toBe(BASE + ',"ping":1,"graphs":{"Usage":{"Players":5}}}');
  });

  it("quotes plotter values ending in zero", async () => {
    const usage = new Graph("Usage");
    usage.addPlotter(createPlotter("Players", () => 10));
    usage.addPlotter(createPlotter("Idle", () => 0));
    const json = await buildReport(input({ graphs: [usage] }));
    expect(json).toContain('"graphs":{"Usage":{"Players":"10","Idle":0}}');
  });

  it("awaits async plotters and truncates fractions", async () => {
    const graph = new Graph("Load");
    graph.addPlotter(createPlotter("Slow", async () => 2.9));
    const json = await buildReport(input({ graphs: [graph] }));
    expect(json).toContain('"graphs":{"Load":{"Slow":2}}');
  });

  it("writes an empty graph as an empty object", async () => {
    const json = await buildReport(input({ graphs: [new Graph("Empty")] }));
    expect(json).toBe(BASE + ',"graphs":{"Empty":{}}}');
  });

  it("escapes graph and column names", async () => {
    const graph = new Graph('Say "hi"');
    graph.addPlotter(createPlotter("tab\there", () => 3));
    const json = await buildReport(input({ graphs: [graph] }));
    expect(json).toContain('"graphs":{"Say \\"hi\\"":{"tab\\there":3}}');
  });

  it("includes every graph exactly once", async () => {
    const graphs = ["a", "b", "c"].map((name) => {
      const graph = new Graph(name);
      graph.addPlotter(createPlotter("v", () => 1));
      return graph;
    });
    const parsed = JSON.parse(await buildReport(input({ graphs })));
    expect(Object.keys(parsed.graphs).sort()).toEqual(["a", "b", "c"]);
  });

  it("ignores plotters added while values are being read", async () => {
    const graph = new Graph("Usage");
    graph.addPlotter(
      createPlotter("first", async () => {
        graph.addPlotter(createPlotter("late", () => 9));
        return 1;
      }),
    );
    const json = await buildReport(input({ graphs: [graph] }));
    expect(json).toContain('"graphs":{"Usage":{"first":1}}');
  });
});

describe("normalizeArch", () => {
  it("rewrites amd64", () => {
    expect(normalizeArch("amd64")).toBe("x86_64");
  });

  it("leaves other tokens alone", () => {
    expect(normalizeArch("arm64")).toBe("arm64");
    expect(normalizeArch("x64")).toBe("x64");
  });
});

describe("detectEnvironment", () => {
  it("reads the running process", () => {
    const facts = detectEnvironment();
    expect(facts.runtimeVersion).toBe(process.version);
    expect(facts.osArch).toBe(process.arch);
    expect(facts.cpuCount).toBeGreaterThan(0);
    expect(facts.osName.length).toBeGreaterThan(0);
  });
});
