import { machine as osMachine, type as osType } from 'node:os'
import { UnsupportedPlatformError } from './errors.js'

export type OperatingSystem = 'linux' | 'macos' | 'windows'

export type Architecture = 'x86_64' | 'arm64'

export type PlatformKey = {
  readonly os: OperatingSystem
  readonly arch: Architecture
}

// What `uname -s` / `uname -m` (or Node's os.type() / os.machine()) report
export type HostIdentity = {
  kernelName: string
  machine: string
}

export const SUPPORTED_PLATFORMS: readonly PlatformKey[] = [
  { os: 'linux', arch: 'x86_64' },
  { os: 'linux', arch: 'arm64' },
  { os: 'macos', arch: 'x86_64' },
  { os: 'macos', arch: 'arm64' },
  { os: 'windows', arch: 'x86_64' },
  { os: 'windows', arch: 'arm64' },
]

const WINDOWS_KERNEL_PATTERN = /^(MINGW|MSYS|CYGWIN)|Windows_NT/i

const ARCH_ALIASES: Record<string, Architecture> = {
  x86_64: 'x86_64',
  amd64: 'x86_64',
  x64: 'x86_64',
  aarch64: 'arm64',
  arm64: 'arm64',
}

export function formatPlatform(key: PlatformKey): string {
  return `${key.os}-${key.arch}`
}

export function readHostIdentity(): HostIdentity {
  return {
    kernelName: osType(),
    machine: osMachine(),
  }
}

function detectOperatingSystem(kernelName: string): OperatingSystem | null {
  if (kernelName.includes('Linux')) return 'linux'
  if (kernelName.includes('Darwin')) return 'macos'
  if (WINDOWS_KERNEL_PATTERN.test(kernelName)) return 'windows'
  return null
}

function detectArchitecture(machine: string): Architecture | null {
  const normalized = machine.trim().toLowerCase()
  return Object.hasOwn(ARCH_ALIASES, normalized)
    ? (ARCH_ALIASES[normalized] ?? null)
    : null
}

export function isSupportedPlatform(key: PlatformKey): boolean {
  return SUPPORTED_PLATFORMS.some(
    (supported) => supported.os === key.os && supported.arch === key.arch,
  )
}

export function detectPlatform(
  identity: HostIdentity = readHostIdentity(),
): PlatformKey {
  const { kernelName, machine } = identity
  const os = detectOperatingSystem(kernelName)
  const arch = detectArchitecture(machine)

  if (!os || !arch || !isSupportedPlatform({ os, arch })) {
    throw new UnsupportedPlatformError(
      kernelName,
      machine,
      SUPPORTED_PLATFORMS.map(formatPlatform),
    )
  }

  return { os, arch }
}
