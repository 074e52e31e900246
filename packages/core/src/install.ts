import { chmod, mkdir, rename, rm, stat } from 'node:fs/promises'
import { FilesystemError } from './errors.js'
import type { OperatingSystem } from './platform.js'

export type InstalledArtifact = {
  path: string
  sizeBytes: number
}

export async function ensureInstallDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true })
  } catch (error) {
    throw new FilesystemError('mkdir', dir, error)
  }
}

export async function makeExecutable(
  filePath: string,
  os: OperatingSystem,
): Promise<void> {
  if (os === 'windows') return

  try {
    await chmod(filePath, 0o755)
  } catch (error) {
    throw new FilesystemError('chmod', filePath, error)
  }
}

/**
 * Move a validated download into place. The file is made executable while
 * it still has its staging name, then renamed over the destination, so the
 * final path only ever holds a complete binary.
 */
export async function installArtifact(options: {
  stagedPath: string
  destination: string
  os: OperatingSystem
}): Promise<InstalledArtifact> {
  const { stagedPath, destination, os } = options

  try {
    await makeExecutable(stagedPath, os)
  } catch (error) {
    await rm(stagedPath, { force: true })
    throw error
  }

  try {
    await rename(stagedPath, destination)
  } catch (error) {
    await rm(stagedPath, { force: true })
    throw new FilesystemError('rename', destination, error)
  }

  const { size } = await stat(destination)
  return { path: destination, sizeBytes: size }
}
