/**
 * Release asset auditing: which published artifacts a release is missing
 */

import type { FetchLike } from '@binrelay/core'
import { z } from 'zod'

const GitHubAssetSchema = z.object({
  name: z.string(),
  size: z.number(),
  browser_download_url: z.string(),
})

export const GitHubReleaseSchema = z.object({
  tag_name: z.string(),
  published_at: z.string().nullable(),
  assets: z.array(GitHubAssetSchema),
})

export type GitHubAsset = z.infer<typeof GitHubAssetSchema>

export type GitHubRelease = z.infer<typeof GitHubReleaseSchema>

export type AssetProblem =
  | { type: 'missing'; platform: string; artifact: string }
  | { type: 'undersized'; platform: string; artifact: string; size: number }

/**
 * Compare a release's assets against the artifact expected for every
 * platform. An asset below `minBytes` would be rejected by the installer,
 * so it counts as a problem too.
 */
export function auditReleaseAssets(
  release: GitHubRelease,
  expected: Record<string, string>,
  minBytes: number,
): AssetProblem[] {
  const assets = new Map(release.assets.map((asset) => [asset.name, asset]))
  const problems: AssetProblem[] = []

  for (const [platform, artifact] of Object.entries(expected)) {
    const asset = assets.get(artifact)
    if (!asset) {
      problems.push({ type: 'missing', platform, artifact })
    } else if (asset.size < minBytes) {
      problems.push({ type: 'undersized', platform, artifact, size: asset.size })
    }
  }

  return problems
}

export async function fetchRelease(options: {
  apiHost: string
  owner: string
  repo: string
  tag: string | null
  token?: string
  fetchImpl?: FetchLike
}): Promise<GitHubRelease> {
  const { apiHost, owner, repo, tag, token, fetchImpl = fetch } = options
  const path = tag ? `tags/${encodeURIComponent(tag)}` : 'latest'
  const url = `${apiHost}/repos/${owner}/${repo}/releases/${path}`

  const response = await fetchImpl(url, {
    headers: {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'binrelay-release-check',
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
    },
  })

  if (!response.ok) {
    throw new Error(`Failed to fetch ${url}: ${response.status}`)
  }

  return GitHubReleaseSchema.parse(await response.json())
}
