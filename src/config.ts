import { DEFAULT_MAX_LINES, isLogLevel, logStore, type LogLevel } from "./state/logStore";

/**
 * How a registration that sets both a source and a target filter resolves.
 *
 * - `"target"`: inject on the target qubits for every matching gate.
 * - `"gated"`: inject on the target qubits only when the gate touches at least
 *   one source qubit.
 */
export type BothFiltersPolicy = "target" | "gated";

export interface NoiseConfig {
  logLevel: LogLevel;
  maxLogLines: number;
  echoLogs: boolean;
  bothFiltersPolicy: BothFiltersPolicy;
}

export const DEFAULT_CONFIG: Readonly<NoiseConfig> = Object.freeze({
  logLevel: "info",
  maxLogLines: DEFAULT_MAX_LINES,
  echoLogs: false,
  bothFiltersPolicy: "target",
});

export type ConfigEnv = Record<string, string | undefined>;

export function isBothFiltersPolicy(value: string): value is BothFiltersPolicy {
  return value === "target" || value === "gated";
}

function parseBool(raw: string): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

/** Reads `NOISE_*` variables; unset or unparsable values are left out. */
export function loadConfigFromEnv(env: ConfigEnv = process.env): Partial<NoiseConfig> {
  const out: Partial<NoiseConfig> = {};

  const level = env.NOISE_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) out.logLevel = level;

  const maxLines = env.NOISE_LOG_MAX_LINES;
  if (maxLines !== undefined) {
    const n = Number(maxLines);
    if (Number.isInteger(n) && n > 0) out.maxLogLines = n;
  }

  const echo = env.NOISE_LOG_ECHO;
  if (echo !== undefined) {
    const b = parseBool(echo);
    if (b !== undefined) out.echoLogs = b;
  }

  const policy = env.NOISE_BOTH_FILTERS_POLICY?.trim().toLowerCase();
  if (policy && isBothFiltersPolicy(policy)) out.bothFiltersPolicy = policy;

  return out;
}

let current: NoiseConfig = { ...DEFAULT_CONFIG };

export function getConfig(): Readonly<NoiseConfig> {
  return current;
}

/** Merges `partial` into the live configuration and pushes log settings to the log store. */
export function configure(partial: Partial<NoiseConfig>): Readonly<NoiseConfig> {
  current = { ...current, ...partial };
  const logs = logStore.getState();
  logs.setMinLevel(current.logLevel);
  logs.setMaxLines(current.maxLogLines);
  logs.setEcho(current.echoLogs);
  return current;
}

/** Back to the defaults, ignoring the environment. */
export function resetConfig(): Readonly<NoiseConfig> {
  return configure({ ...DEFAULT_CONFIG });
}

configure(loadConfigFromEnv());
