/**
 * Raw TCP reachability probe.
 *
 * A probe succeeds as soon as the target accepts a connection; no bytes are
 * exchanged and the socket is torn down immediately. Every failure mode
 * (refused, unresolvable, unreachable, timeout) resolves as `success: false`.
 */

import net from "node:net";
import { logProbe } from "../logging.js";

export interface Target {
  host: string;
  port: number;
}

export interface ProbeResult {
  success: boolean;
  latencyMs: number;
  error?: string;
}

export interface ProbeOptions {
  timeoutMs: number;
}

export type Probe = (target: Target) => Promise<ProbeResult>;

export function probeTcp(target: Target, options: ProbeOptions): Promise<ProbeResult> {
  const startMs = Date.now();

  return new Promise((resolve) => {
    let settled = false;
    const socket = net.createConnection({ host: target.host, port: target.port });

    const finish = (result: Omit<ProbeResult, "latencyMs">) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      socket.destroy();
      const latencyMs = Date.now() - startMs;
      logProbe.debug({ ...target, ...result, latencyMs }, "TCP probe finished");
      resolve({ ...result, latencyMs });
    };

    const timeoutId = setTimeout(() => {
      finish({ success: false, error: `Timeout after ${options.timeoutMs}ms` });
    }, options.timeoutMs);

    socket.once("connect", () => finish({ success: true }));
    socket.once("error", (err: NodeJS.ErrnoException) => {
      finish({ success: false, error: err.code ?? err.message });
    });
  });
}

/** Bind a probe to fixed options, for injection into the gate loop. */
export function createTcpProbe(options: ProbeOptions): Probe {
  return (target) => probeTcp(target, options);
}
