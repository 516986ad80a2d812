import { z } from "zod";
import type { GateConfig } from "./config.js";
import { UsageError } from "./gate/errors.js";

const portSchema = z.coerce.number().int().min(1).max(65535);
const msSchema = z.coerce.number().int().positive();

const OverridesSchema = z
  .object({
    host: z.string().trim().min(1),
    port: portSchema,
    intervalMs: msSchema,
    connectTimeoutMs: msSchema,
  })
  .partial();

export type CliOverrides = z.infer<typeof OverridesSchema>;

export interface ParsedArgs {
  overrides: CliOverrides;
  command: string[];
}

type OverrideKey = keyof CliOverrides;

const FLAGS: Readonly<Record<string, OverrideKey | "target" | undefined>> = {
  "--host": "host",
  "--port": "port",
  "--interval-ms": "intervalMs",
  "--connect-timeout-ms": "connectTimeoutMs",
  "--target": "target",
};

export const USAGE =
  "usage: readiness-gate [--host <host>] [--port <port>] [--target <host:port>]\n" +
  "                      [--interval-ms <ms>] [--connect-timeout-ms <ms>] [--] <command> [args...]";

/**
 * Split argv (without node and script) into gate options and the command.
 *
 * Options are only recognised before the command. `--` ends them explicitly;
 * otherwise the first word not starting with `--` begins the command, so
 * `readiness-gate node server.js` works as a Docker ENTRYPOINT/CMD pair.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const raw: Partial<Record<OverrideKey, string>> = {};
  let i = 0;

  while (i < argv.length) {
    const arg = argv[i];
    if (arg === "--") {
      i++;
      break;
    }
    if (!arg.startsWith("--")) break;

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = FLAGS[flag];
    if (!key) {
      throw new UsageError(`Unknown option: ${flag}\n${USAGE}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
      i++;
    } else {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new UsageError(`Option ${flag} requires a value\n${USAGE}`);
      }
      value = next;
      i += 2;
    }

    if (key === "target") {
      const { host, port } = splitHostPort(value);
      raw.host = host;
      raw.port = port;
    } else {
      raw[key] = value;
    }
  }

  const result = OverridesSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new UsageError(`Invalid option value (${detail})\n${USAGE}`);
  }

  return { overrides: result.data, command: argv.slice(i) };
}

/** Accepts `host:port` and `[v6addr]:port`. */
export function splitHostPort(value: string): { host: string; port: string } {
  const match = /^\[([^\]]+)\]:(\d+)$/.exec(value) ?? /^([^:]+):(\d+)$/.exec(value);
  if (!match) {
    throw new UsageError(`--target expects host:port, got "${value}"`);
  }
  return { host: match[1], port: match[2] };
}

/** CLI flags win over environment-derived values. */
export function applyOverrides(cfg: GateConfig, overrides: CliOverrides): GateConfig {
  return {
    ...cfg,
    target: {
      ...cfg.target,
      host: overrides.host ?? cfg.target.host,
      port: overrides.port ?? cfg.target.port,
    },
    poll: {
      intervalMs: overrides.intervalMs ?? cfg.poll.intervalMs,
      connectTimeoutMs: overrides.connectTimeoutMs ?? cfg.poll.connectTimeoutMs,
    },
  };
}
