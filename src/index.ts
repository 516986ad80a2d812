#!/usr/bin/env node
import { applyOverrides, parseArgs } from "./cli.js";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { ConfigError, GateError } from "./gate/errors.js";
import { runGate } from "./gate/readiness-gate.js";
import { flushLogger, logger } from "./logging.js";
import { getGateState } from "./ops/readiness.js";

async function main(): Promise<number> {
  const { overrides, command } = parseArgs(process.argv.slice(2));
  const cfg = applyOverrides(config, overrides);

  // Validate configuration before anything is printed
  const validation = validateConfig(cfg);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    throw new ConfigError(validation.errors);
  }

  logger.debug(
    { target: cfg.target, poll: cfg.poll, command },
    "Readiness gate starting",
  );

  return runGate(cfg, command);
}

main()
  .then(async (code) => {
    await flushLogger();
    process.exit(code);
  })
  .catch(async (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug({ err, state: getGateState() }, "Gate stopped on error");
    process.stderr.write(`readiness-gate: ${message}\n`);
    await flushLogger();
    process.exit(err instanceof GateError ? err.exitCode : 1);
  });
