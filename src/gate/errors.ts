/**
 * Fatal gate errors. Each carries the process exit status the entrypoint uses.
 * Connection failures while polling are not errors: the gate retries them.
 */
export class GateError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GateError";
    this.exitCode = exitCode;
  }
}

/** Bad command line. */
export class UsageError extends GateError {
  constructor(message: string) {
    super(message, 2);
    this.name = "UsageError";
  }
}

/** Configuration failed validation (EX_CONFIG). */
export class ConfigError extends GateError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`, 78);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

/** The command could not be started: 127 not found, 126 not executable. */
export class CommandLaunchError extends GateError {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, code: string | undefined, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to launch "${command}": ${reason}`, launchExitCode(code), { cause });
    this.name = "CommandLaunchError";
    this.command = command;
    this.code = code;
  }
}

/** The wait was cancelled through its AbortSignal. */
export class GateAbortedError extends GateError {
  constructor() {
    super("Wait for target aborted", 130);
    this.name = "GateAbortedError";
  }
}

function launchExitCode(code: string | undefined): number {
  if (code === "ENOENT") return 127;
  if (code === "EACCES" || code === "EPERM") return 126;
  return 1;
}
