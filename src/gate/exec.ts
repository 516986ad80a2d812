/**
 * Hand control to the wrapped command.
 *
 * Node cannot replace its own process image, so the command runs as a child
 * with the parent's stdio and environment. Termination signals are relayed to
 * it and its exit status becomes ours; only the PID differs from a real exec.
 */

import { spawn } from "node:child_process";
import { constants } from "node:os";
import { logExec } from "../logging.js";
import { setGateState } from "../ops/readiness.js";
import { CommandLaunchError } from "./errors.js";

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
  "SIGQUIT",
  "SIGUSR1",
  "SIGUSR2",
];

export interface ExecOptions {
  env?: NodeJS.ProcessEnv;
  /** Defaults to "inherit"; tests pipe output to capture it */
  stdio?: "inherit" | "pipe";
  onStdout?: (chunk: string) => void;
}

/** Exit status a POSIX shell reports for a child killed by `signal`. */
export function signalExitCode(signal: NodeJS.Signals): number {
  const num = constants.signals[signal];
  return 128 + num;
}

/**
 * Run `command` to completion and resolve with the exit status to propagate.
 * An empty command is a no-op that resolves 0.
 */
export function execCommand(command: readonly string[], options: ExecOptions = {}): Promise<number> {
  if (command.length === 0) {
    logExec.info("No command given — nothing to run");
    setGateState("replaced");
    return Promise.resolve(0);
  }

  const [file, ...args] = command;
  logExec.info({ file, args }, "Launching command");

  return new Promise((resolve, reject) => {
    const child = spawn(file, args, {
      env: options.env ?? process.env,
      stdio: options.stdio ?? "inherit",
    });

    const relays = new Map<NodeJS.Signals, () => void>();
    for (const signal of FORWARDED_SIGNALS) {
      const relay = () => {
        logExec.debug({ signal, pid: child.pid }, "Forwarding signal to command");
        child.kill(signal);
      };
      relays.set(signal, relay);
      process.on(signal, relay);
    }
    const detach = () => {
      for (const [signal, relay] of relays) process.off(signal, relay);
      relays.clear();
    };

    if (options.onStdout && child.stdout) {
      const onStdout = options.onStdout;
      child.stdout.on("data", (data: Buffer) => onStdout(data.toString()));
    }

    child.once("spawn", () => {
      setGateState("replaced");
    });

    child.once("error", (err: NodeJS.ErrnoException) => {
      detach();
      logExec.error({ err, file }, "Command failed to launch");
      reject(new CommandLaunchError(file, err.code, err));
    });

    child.once("close", (code, signal) => {
      detach();
      if (signal) {
        logExec.info({ signal }, "Command terminated by signal");
        resolve(signalExitCode(signal));
        return;
      }
      logExec.info({ code }, "Command exited");
      resolve(code ?? 1);
    });
  });
}
