import type { GateConfig } from "./config.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/** Beyond this a single hung attempt stalls the poll loop for over a minute. */
const SLOW_CONNECT_TIMEOUT_MS = 60_000;

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - target host is set
 * - target port is in valid range (1-65535)
 * - poll.intervalMs is a positive integer
 * - poll.connectTimeoutMs is a positive integer (warning above 60s)
 * - logging.level is a pino level
 */
export function validateConfig(cfg: GateConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!cfg.target.host) {
    errors.push("Target host is required");
  }

  if (!isValidPort(cfg.target.port)) {
    errors.push(`Target port must be between 1 and 65535, got ${cfg.target.port}`);
  }

  if (!isPositiveInteger(cfg.poll.intervalMs)) {
    errors.push(`poll.intervalMs must be a positive integer, got ${cfg.poll.intervalMs}`);
  }

  if (!isPositiveInteger(cfg.poll.connectTimeoutMs)) {
    errors.push(`poll.connectTimeoutMs must be a positive integer, got ${cfg.poll.connectTimeoutMs}`);
  } else if (cfg.poll.connectTimeoutMs > SLOW_CONNECT_TIMEOUT_MS) {
    warnings.push(
      `poll.connectTimeoutMs is ${cfg.poll.connectTimeoutMs}ms — a single unanswered attempt will block the wait that long`,
    );
  }

  if (!LOG_LEVELS.includes(cfg.logging.level)) {
    errors.push(`logging.level must be one of ${LOG_LEVELS.join(", ")}, got "${cfg.logging.level}"`);
  }

  return { errors, warnings };
}

/**
 * Checks if a port number is in the valid range (1-65535).
 */
function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
