/**
 * Plugin Config Error
 *
 * Thrown when a session is configured without one of its required
 * collaborators. `field` names the missing piece.
 */
export class PluginConfigError extends Error {
  readonly name = "PluginConfigError";

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
  }
}

/**
 * Store Command Error
 *
 * A password-store command exited non-zero. An exit code of -1 means the
 * binary could not be found.
 */
export class StoreCommandError extends Error {
  readonly name = "StoreCommandError";

  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(
      exitCode === -1
        ? `${command}: command not found`
        : `${command} exited with code ${exitCode}${stderr ? `: ${stderr}` : ""}`,
    );
  }
}

export function isPluginConfigError(error: unknown): error is PluginConfigError {
  return error instanceof PluginConfigError;
}

export function isStoreCommandError(error: unknown): error is StoreCommandError {
  return error instanceof StoreCommandError;
}
