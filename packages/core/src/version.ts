import { z } from 'zod'
import type { InstallerConfig } from './config.js'
import { describeError } from './errors.js'
import type { Logger } from './logger.js'

export type FetchLike = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>

export type ReleaseVersion =
  | { kind: 'pinned'; tag: string }
  | { kind: 'latest'; tag: string }
  // Latest addressed through the release host's redirect, no metadata call
  | { kind: 'latest-redirect' }
  | { kind: 'unresolved'; reason: string }

const LatestReleaseSchema = z.object({
  tag_name: z.string().trim().min(1),
})

export function getLatestReleaseUrl(
  config: Pick<InstallerConfig, 'apiHost' | 'owner' | 'repo'>,
): string {
  return `${config.apiHost}/repos/${config.owner}/${config.repo}/releases/latest`
}

async function fetchLatestTag(
  config: InstallerConfig,
  fetchImpl: FetchLike,
): Promise<ReleaseVersion> {
  const url = getLatestReleaseUrl(config)

  let response: Response
  try {
    response = await fetchImpl(url, {
      headers: {
        Accept: 'application/vnd.github+json',
        'User-Agent': config.userAgent,
      },
      signal: AbortSignal.timeout(config.metadataTimeoutMs),
    })
  } catch (error) {
    return {
      kind: 'unresolved',
      reason: `request to ${url} failed: ${describeError(error)}`,
    }
  }

  if (!response.ok) {
    return {
      kind: 'unresolved',
      reason: `${url} answered ${response.status} ${response.statusText}`.trim(),
    }
  }

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    return {
      kind: 'unresolved',
      reason: `${url} returned invalid JSON: ${describeError(error)}`,
    }
  }

  const parsed = LatestReleaseSchema.safeParse(body)
  if (!parsed.success) {
    return {
      kind: 'unresolved',
      reason: `${url} returned no release tag`,
    }
  }

  return { kind: 'latest', tag: parsed.data.tag_name }
}

/**
 * Decide which release to fetch. Never throws: a failed metadata lookup
 * comes back as `unresolved` so the caller can fall through to the
 * version-independent mirror.
 */
export async function resolveVersion(options: {
  config: InstallerConfig
  fetchImpl: FetchLike
  logger: Logger
}): Promise<ReleaseVersion> {
  const { config, fetchImpl, logger } = options

  if (config.version) {
    logger.debug(`Using pinned version ${config.version}`)
    return { kind: 'pinned', tag: config.version }
  }

  if (config.latestStrategy === 'redirect') {
    logger.debug('Using the latest release redirect')
    return { kind: 'latest-redirect' }
  }

  logger.step(`Looking up the latest ${config.product} release`)
  const version = await fetchLatestTag(config, fetchImpl)

  if (version.kind === 'unresolved') {
    logger.warn(
      `Could not determine the latest version (${version.reason}); ` +
        `falling back to the ${config.mirrorBranch} mirror`,
    )
  } else if (version.kind === 'latest') {
    logger.success(`Latest release is ${version.tag}`)
  }

  return version
}

export function describeVersion(version: ReleaseVersion): string {
  switch (version.kind) {
    case 'pinned':
      return `${version.tag} (pinned)`
    case 'latest':
      return version.tag
    case 'latest-redirect':
      return 'latest'
    case 'unresolved':
      return 'unknown'
  }
}
