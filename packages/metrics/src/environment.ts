import { arch, availableParallelism, release, type } from "node:os";
import type { EnvironmentFacts } from "./types.js";

/** Architecture tokens rewritten so every client reports the same name. */
const ARCH_ALIASES = new Map<string, string>([["amd64", "x86_64"]]);

export function normalizeArch(osArch: string): string {
  return ARCH_ALIASES.get(osArch) ?? osArch;
}

/** Read the environment facts from the running Node.js process. */
export function detectEnvironment(): EnvironmentFacts {
  return {
    osName: type(),
    osArch: arch(),
    osVersion: release(),
    runtimeVersion: process.version,
    cpuCount: availableParallelism(),
  };
}
