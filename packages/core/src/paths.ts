import { homedir } from 'node:os'
import { join } from 'node:path'
import type { Env } from './config.js'
import type { OperatingSystem } from './platform.js'

export type InstallDirOptions = {
  product: string
  os: OperatingSystem
  installDir?: string | null
  env?: Env
  homeDir?: string
}

/**
 * Per-user directory the executable is installed into.
 *
 * An explicit directory wins. On Windows the binary goes under
 * %LOCALAPPDATA%, elsewhere it follows XDG_BIN_HOME and falls back to
 * ~/.local/bin.
 */
export function getInstallDir(options: InstallDirOptions): string {
  const { product, os, installDir, env = process.env, homeDir = homedir() } =
    options

  if (installDir) {
    return installDir
  }

  if (os === 'windows') {
    return join(
      env['LOCALAPPDATA'] || join(homeDir, 'AppData', 'Local'),
      product,
      'bin',
    )
  }

  if (env['XDG_BIN_HOME']) {
    return env['XDG_BIN_HOME']
  }

  return join(homeDir, '.local', 'bin')
}

export function getInstallPath(
  installDir: string,
  executableName: string,
): string {
  return join(installDir, executableName)
}

// Downloads land beside the final path so the closing rename stays on one filesystem
export function getStagingPath(installPath: string): string {
  return `${installPath}.download`
}

export function defaultStartupFiles(
  os: OperatingSystem,
  homeDir: string = homedir(),
): string[] {
  const files = ['.bashrc', '.zshrc']
  if (os === 'macos') {
    files.push('.bash_profile')
  }
  return files.map((file) => join(homeDir, file))
}
