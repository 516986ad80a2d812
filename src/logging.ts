import pino from "pino";
import { LOG_LEVELS } from "./config-validator.js";

// pino throws on an unknown level; config-validator reports it instead
const requested = process.env.LOG_LEVEL ?? "warn";
const level = LOG_LEVELS.includes(requested) ? requested : "warn";

// Diagnostics go to stderr only: stdout belongs to the status lines and the child command.
const transport = pino.transport({
  targets: [
    {
      target: "pino-pretty",
      options: {
        destination: 2, // stderr
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
      level,
    },
  ],
});

export const logger = pino(
  {
    level,
    base: { service: "readiness-gate" },
  },
  transport,
);

// Typed child loggers for subsystems
export const logProbe = logger.child({ subsystem: "probe" });
export const logGate = logger.child({ subsystem: "gate" });
export const logExec = logger.child({ subsystem: "exec" });

/** Drain buffered log lines before the process exits. */
export function flushLogger(): Promise<void> {
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}
