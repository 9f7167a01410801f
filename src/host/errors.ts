/**
 * Failure taxonomy for environment provisioning.
 *
 * HostUnavailableError is fatal for the whole run. The others are scoped to
 * one container or one engine; the orchestrator records them and moves on.
 */

/** The `lxc` binary is missing, or the LXD daemon is unreachable or refuses us. */
export class HostUnavailableError extends Error {
  readonly name = "HostUnavailableError" as const;
  constructor(detail: string) {
    super(`Container host unavailable: ${detail}`);
  }
}

/** `lxc launch` (or `lxc start`) failed for a container. */
export class ContainerLaunchError extends Error {
  readonly name = "ContainerLaunchError" as const;
  constructor(
    readonly container: string,
    detail: string,
  ) {
    super(`Failed to launch container ${container}: ${detail}`);
  }
}

/** A container did not reach a running init system within the boot timeout. */
export class BootTimeoutError extends Error {
  readonly name = "BootTimeoutError" as const;
  constructor(
    readonly container: string,
    readonly timeoutMs: number,
    readonly lastState: string,
  ) {
    super(`Container ${container} did not finish booting within ${timeoutMs}ms (last state: ${lastState})`);
  }
}

/** A download inside a container failed or returned a non-success status. */
export class FetchError extends Error {
  readonly name = "FetchError" as const;
  constructor(
    readonly url: string,
    readonly exitCode: number,
    detail: string,
  ) {
    super(`Download of ${url} failed (exit ${exitCode}): ${detail}`);
  }
}

/** A provisioning recipe step exited non-zero. */
export class ProvisionStepError extends Error {
  readonly name = "ProvisionStepError" as const;
  constructor(
    readonly engine: string,
    readonly step: string,
    readonly exitCode: number,
    detail: string,
  ) {
    super(`${engine}: step "${step}" failed (exit ${exitCode}): ${detail}`);
  }
}

/** Errors that end the run before any engine is attempted. */
export function isFatal(err: unknown): err is HostUnavailableError {
  return err instanceof HostUnavailableError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
