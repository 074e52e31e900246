import type { OperatingSystem, PlatformKey } from './platform.js'

const EXECUTABLE_EXTENSIONS: Record<OperatingSystem, string> = {
  linux: '',
  macos: '',
  windows: '.exe',
}

export function getExecutableExtension(os: OperatingSystem): string {
  return EXECUTABLE_EXTENSIONS[os]
}

/**
 * Name of the file the release pipeline publishes for a platform,
 * e.g. `dymo-code-linux-x86_64` or `dymo-code-windows-x86_64.exe`.
 */
export function resolveArtifactName(product: string, key: PlatformKey): string {
  return `${product}-${key.os}-${key.arch}${getExecutableExtension(key.os)}`
}

// Installed under the plain invocation name, never with a version suffix
export function getExecutableName(product: string, key: PlatformKey): string {
  return `${product}${getExecutableExtension(key.os)}`
}
