import type { InstallerConfig } from './config.js'
import type { ReleaseVersion } from './version.js'

export type SourceKind = 'primary' | 'mirror'

export type SourceCandidate = {
  url: string
  kind: SourceKind
}

type UrlConfig = Pick<
  InstallerConfig,
  | 'releaseHost'
  | 'mirrorHost'
  | 'mirrorScheme'
  | 'mirrorBranch'
  | 'mirrorDirectory'
  | 'owner'
  | 'repo'
>

function joinUrlPath(...segments: string[]): string {
  return segments
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0)
    .join('/')
}

/**
 * Canonical release-host URL. Returns null when the version is unknown,
 * since the release host can only be addressed by tag or by its
 * latest-release redirect.
 */
export function getPrimaryUrl(
  config: UrlConfig,
  artifactName: string,
  version: ReleaseVersion,
): string | null {
  const base = `${config.releaseHost}/${config.owner}/${config.repo}/releases`

  switch (version.kind) {
    case 'pinned':
    case 'latest':
      return `${base}/download/${encodeURIComponent(version.tag)}/${artifactName}`
    case 'latest-redirect':
      return `${base}/latest/download/${artifactName}`
    case 'unresolved':
      return null
  }
}

/**
 * Branch-addressed copy of the artifact, independent of release tags.
 *
 * raw-content: https://raw.githubusercontent.com/<owner>/<repo>/<branch>/<dir>/<artifact>
 * github-raw:  https://github.com/<owner>/<repo>/raw/refs/heads/<branch>/<dir>/<artifact>
 */
export function getMirrorUrl(config: UrlConfig, artifactName: string): string {
  const { owner, repo, mirrorBranch, mirrorDirectory } = config

  if (config.mirrorScheme === 'github-raw') {
    return `${config.releaseHost}/${joinUrlPath(
      owner,
      repo,
      'raw/refs/heads',
      mirrorBranch,
      mirrorDirectory,
      artifactName,
    )}`
  }

  return `${config.mirrorHost}/${joinUrlPath(
    owner,
    repo,
    mirrorBranch,
    mirrorDirectory,
    artifactName,
  )}`
}

export function buildSourceCandidates(
  config: UrlConfig,
  artifactName: string,
  version: ReleaseVersion,
): SourceCandidate[] {
  const candidates: SourceCandidate[] = []

  const primary = getPrimaryUrl(config, artifactName, version)
  if (primary) {
    candidates.push({ url: primary, kind: 'primary' })
  }

  candidates.push({ url: getMirrorUrl(config, artifactName), kind: 'mirror' })

  return candidates
}

export function getReleasesPageUrl(
  config: Pick<InstallerConfig, 'releaseHost' | 'owner' | 'repo'>,
): string {
  return `${config.releaseHost}/${config.owner}/${config.repo}/releases`
}

export function describeCandidates(candidates: SourceCandidate[]): string {
  return candidates
    .map((candidate, index) => `${index + 1}. [${candidate.kind}] ${candidate.url}`)
    .join('\n')
}
