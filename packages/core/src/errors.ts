export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_MANUAL_COMPLETION = 2

export class InstallerError extends Error {
  readonly exitCode: number

  constructor(message: string, exitCode: number = EXIT_FAILURE) {
    super(message)
    this.name = 'InstallerError'
    this.exitCode = exitCode
  }
}

export class UnsupportedPlatformError extends InstallerError {
  constructor(
    public readonly kernelName: string,
    public readonly machine: string,
    supported: readonly string[],
  ) {
    super(
      `Unsupported platform: ${kernelName} ${machine}. ` +
        `Supported platforms: ${supported.join(', ')}`,
    )
    this.name = 'UnsupportedPlatformError'
  }
}

export class ConfigError extends InstallerError {
  constructor(public readonly issues: string[]) {
    super(`Invalid installer configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

export type FilesystemOperation =
  | 'mkdir'
  | 'chmod'
  | 'rename'
  | 'read'
  | 'append'

export class FilesystemError extends InstallerError {
  constructor(
    public readonly operation: FilesystemOperation,
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to ${operation} ${path}: ${describeError(cause)}`)
    this.name = 'FilesystemError'
    this.cause = cause
  }
}

/**
 * Raised after every automated source is exhausted and the user has been
 * shown where to download the artifact by hand. Not a crash: callers map it
 * to its own exit code.
 */
export class ManualCompletionRequiredError extends InstallerError {
  constructor(
    public readonly url: string,
    public readonly destination: string,
    public readonly attempts: number,
  ) {
    super(
      `Automatic download failed after ${attempts} attempts. ` +
        `Download ${url} manually and save it as ${destination}`,
      EXIT_MANUAL_COMPLETION,
    )
    this.name = 'ManualCompletionRequiredError'
  }
}

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message)
    this.name = 'DownloadError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof InstallerError) {
    return error.exitCode
  }
  return EXIT_FAILURE
}
