import { homedir } from 'node:os'
import { resolveArtifactName, getExecutableName } from './artifact.js'
import type { Env, InstallerConfig } from './config.js'
import { acquireArtifact, formatBytes, type DownloadAttempt } from './download.js'
import { ManualCompletionRequiredError } from './errors.js'
import {
  createTerminalPrompt,
  createUrlOpener,
  runManualFallback,
  type Prompt,
  type UrlOpener,
} from './fallback.js'
import { ensureInstallDir, installArtifact } from './install.js'
import { createLogger, type Logger } from './logger.js'
import { ensurePathEntry, type PathRegistration } from './path-registry.js'
import {
  defaultStartupFiles,
  getInstallDir,
  getInstallPath,
  getStagingPath,
} from './paths.js'
import {
  detectPlatform,
  formatPlatform,
  readHostIdentity,
  type HostIdentity,
  type PlatformKey,
} from './platform.js'
import {
  buildSourceCandidates,
  describeCandidates,
  getReleasesPageUrl,
  type SourceCandidate,
} from './sources.js'
import {
  describeVersion,
  resolveVersion,
  type FetchLike,
  type ReleaseVersion,
} from './version.js'

export type InstallerDependencies = {
  fetchImpl?: FetchLike
  sleep?: (ms: number) => Promise<void>
  prompt?: Prompt
  openUrl?: UrlOpener
  identity?: HostIdentity
  env?: Env
  homeDir?: string
  logger?: Logger
}

export type InstallReport = {
  platform: PlatformKey
  artifactName: string
  version: ReleaseVersion
  installedPath: string
  sizeBytes: number
  source: SourceCandidate
  attempts: DownloadAttempt[]
  path: PathRegistration | null
}

function pickManualUrl(
  candidates: SourceCandidate[],
  config: InstallerConfig,
): string {
  const primary = candidates.find((candidate) => candidate.kind === 'primary')
  return primary?.url ?? candidates[0]?.url ?? getReleasesPageUrl(config)
}

/**
 * Detect, resolve, download, install and register one artifact.
 *
 * Throws UnsupportedPlatformError before any network traffic,
 * ManualCompletionRequiredError when every source failed, and
 * FilesystemError for local failures.
 */
export async function runInstaller(
  config: InstallerConfig,
  deps: InstallerDependencies = {},
): Promise<InstallReport> {
  const {
    fetchImpl = fetch,
    sleep,
    identity = readHostIdentity(),
    env = process.env,
    homeDir = homedir(),
    logger = createLogger({ prefix: config.product }),
  } = deps

  const platform = detectPlatform(identity)
  const artifactName = resolveArtifactName(config.product, platform)
  logger.step(`Detected ${formatPlatform(platform)}, artifact ${artifactName}`)

  const installDir = getInstallDir({
    product: config.product,
    os: platform.os,
    installDir: config.installDir,
    env,
    homeDir,
  })
  const installedPath = getInstallPath(
    installDir,
    getExecutableName(config.product, platform),
  )

  const version = await resolveVersion({ config, fetchImpl, logger })
  const candidates = buildSourceCandidates(config, artifactName, version)
  logger.debug(`Sources:\n${describeCandidates(candidates)}`)

  await ensureInstallDir(installDir)

  const acquisition = await acquireArtifact({
    candidates,
    stagingPath: getStagingPath(installedPath),
    maxPrimaryAttempts: config.maxPrimaryAttempts,
    retryDelayMs: config.retryDelayMs,
    minArtifactBytes: config.minArtifactBytes,
    requestTimeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
    fetchImpl,
    sleep,
    logger,
  })

  if (acquisition.status === 'exhausted') {
    const url = pickManualUrl(candidates, config)
    await runManualFallback({
      url,
      destination: installedPath,
      attempts: acquisition.attempts.length,
      prompt: deps.prompt ?? createTerminalPrompt(),
      openUrl: deps.openUrl ?? createUrlOpener(platform.os),
      logger,
    })
    throw new ManualCompletionRequiredError(
      url,
      installedPath,
      acquisition.attempts.length,
    )
  }

  const installed = await installArtifact({
    stagedPath: acquisition.path,
    destination: installedPath,
    os: platform.os,
  })
  logger.success(
    `Installed ${config.product} ${describeVersion(version)} to ${installed.path} ` +
      `(${formatBytes(installed.sizeBytes)})`,
  )

  let path: PathRegistration | null = null
  if (config.modifyPath) {
    path = await ensurePathEntry({
      directory: installDir,
      startupFiles: config.startupFiles ?? defaultStartupFiles(platform.os, homeDir),
      env,
      os: platform.os,
    })
    for (const file of path.appended) {
      logger.info(`Added ${installDir} to PATH in ${file}`)
    }
    if (path.appended.length === 0 && path.alreadyPresent.length > 0) {
      logger.debug(`${installDir} is already on PATH`)
    }
  } else {
    logger.debug('Leaving shell startup files untouched')
  }

  return {
    platform,
    artifactName,
    version,
    installedPath: installed.path,
    sizeBytes: installed.sizeBytes,
    source: acquisition.candidate,
    attempts: acquisition.attempts,
    path,
  }
}
