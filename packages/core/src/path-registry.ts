import { appendFile, readFile } from 'node:fs/promises'
import { delimiter as platformDelimiter } from 'node:path'
import type { Env } from './config.js'
import { FilesystemError } from './errors.js'
import type { OperatingSystem } from './platform.js'

export type PathRegistration = {
  directory: string
  appended: string[]
  alreadyPresent: string[]
  missing: string[]
  sessionUpdated: boolean
}

export function formatPathExport(directory: string): string {
  return `export PATH="$PATH:${directory}"`
}

/**
 * Directory as the shell reading the startup file spells it. Git Bash and
 * MSYS2 split PATH on `:`, so `C:\Users\me` must be written `/c/Users/me`.
 */
export function toShellPath(directory: string, os: OperatingSystem): string {
  if (os !== 'windows') return directory

  const forward = directory.replace(/\\/g, '/')
  return forward.replace(
    /^([A-Za-z]):(?=\/|$)/,
    (_match, drive: string) => `/${drive.toLowerCase()}`,
  )
}

export function isOnPath(
  directory: string,
  pathValue: string | undefined,
  delimiter: string = platformDelimiter,
): boolean {
  if (!pathValue) return false
  return pathValue.split(delimiter).includes(directory)
}

async function readStartupFile(file: string): Promise<string | null> {
  try {
    return await readFile(file, 'utf-8')
  } catch (error) {
    if (isMissingFileError(error)) {
      return null
    }
    throw new FilesystemError('read', file, error)
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

/**
 * Make sure `directory` is on the command search path now and in future
 * shells. A startup file that does not exist is skipped; one that already
 * mentions the directory is left alone. Re-running never adds a second
 * entry.
 */
export async function ensurePathEntry(options: {
  directory: string
  startupFiles: string[]
  env?: Env
  delimiter?: string
  os?: OperatingSystem
}): Promise<PathRegistration> {
  const {
    directory,
    startupFiles,
    env = process.env,
    delimiter = platformDelimiter,
    os = 'linux',
  } = options
  const shellDirectory = toShellPath(directory, os)

  const registration: PathRegistration = {
    directory,
    appended: [],
    alreadyPresent: [],
    missing: [],
    sessionUpdated: false,
  }

  for (const file of startupFiles) {
    const contents = await readStartupFile(file)

    if (contents === null) {
      registration.missing.push(file)
      continue
    }

    if (contents.includes(shellDirectory)) {
      registration.alreadyPresent.push(file)
      continue
    }

    const separator = contents.length > 0 && !contents.endsWith('\n') ? '\n' : ''
    try {
      await appendFile(
        file,
        `${separator}${formatPathExport(shellDirectory)}\n`,
        'utf-8',
      )
    } catch (error) {
      throw new FilesystemError('append', file, error)
    }
    registration.appended.push(file)
  }

  if (!isOnPath(directory, env['PATH'], delimiter)) {
    env['PATH'] = env['PATH'] ? `${env['PATH']}${delimiter}${directory}` : directory
    registration.sessionUpdated = true
  }

  return registration
}
