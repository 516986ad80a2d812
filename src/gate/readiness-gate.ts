/**
 * Readiness gate — announce, poll until the target accepts a TCP connection,
 * announce readiness, then run the wrapped command.
 *
 * The poll loop has no attempt cap and no overall deadline: connection
 * failures only ever mean "not ready yet".
 */

import type { GateConfig } from "../config.js";
import { logGate } from "../logging.js";
import { setGateState } from "../ops/readiness.js";
import { GateAbortedError } from "./errors.js";
import { execCommand } from "./exec.js";
import { createTcpProbe, type Probe, type Target } from "./probe.js";

export interface WaitOptions {
  intervalMs: number;
  connectTimeoutMs: number;
  serviceName: string;
  targetName: string;
  signal?: AbortSignal;
}

export interface GateDeps {
  probe?: Probe;
  sleep?: (ms: number) => Promise<void>;
  /** Receives each status line without its trailing newline */
  write?: (line: string) => void;
  exec?: (command: readonly string[]) => Promise<number>;
}

export interface WaitResult {
  attempts: number;
  sleeps: number;
  waitedMs: number;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

function writeStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function startMessage(serviceName: string): string {
  return `Starting ${serviceName}...`;
}

export function waitingMessage(targetName: string): string {
  return `Waiting for ${targetName} to be ready...`;
}

export function readyMessage(targetName: string): string {
  return `${targetName} is ready!`;
}

/**
 * Block until `target` accepts a connection. Resolves only on success; rejects
 * only if `options.signal` aborts. Runs once per process (see ops/readiness).
 */
export async function waitForTarget(
  target: Target,
  options: WaitOptions,
  deps: GateDeps = {},
): Promise<WaitResult> {
  const probe = deps.probe ?? createTcpProbe({ timeoutMs: options.connectTimeoutMs });
  const pause = deps.sleep ?? sleep;
  const write = deps.write ?? writeStdout;
  const { signal } = options;
  const startMs = Date.now();

  setGateState("announcing");
  write(startMessage(options.serviceName));
  write(waitingMessage(options.targetName));

  setGateState("polling");
  let attempts = 0;
  let sleeps = 0;
  for (;;) {
    if (signal?.aborted) throw new GateAbortedError();

    attempts++;
    const result = await probe(target);
    if (result.success) break;

    logGate.debug(
      { ...target, attempt: attempts, error: result.error },
      "Target not reachable yet",
    );

    if (signal?.aborted) throw new GateAbortedError();
    await pause(options.intervalMs);
    sleeps++;
  }

  const waitedMs = Date.now() - startMs;
  setGateState("ready");
  logGate.info({ ...target, attempts, waitedMs }, "Target reachable");
  write(readyMessage(options.targetName));

  return { attempts, sleeps, waitedMs };
}

/**
 * Full entrypoint sequence for an already-validated config. Resolves with the
 * exit status the process should terminate with.
 */
export async function runGate(
  cfg: GateConfig,
  command: readonly string[],
  deps: GateDeps = {},
): Promise<number> {
  await waitForTarget(
    { host: cfg.target.host, port: cfg.target.port },
    {
      intervalMs: cfg.poll.intervalMs,
      connectTimeoutMs: cfg.poll.connectTimeoutMs,
      serviceName: cfg.service.name,
      targetName: cfg.target.name,
    },
    deps,
  );

  const exec = deps.exec ?? ((cmd: readonly string[]) => execCommand(cmd));
  return exec(command);
}
