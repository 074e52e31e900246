#!/usr/bin/env tsx
/**
 * Check that a GitHub release carries an artifact for every supported
 * platform, each large enough for the installer to accept.
 *
 * Usage:
 *   npm run check-release              # latest release
 *   npm run check-release -- --tag v1.4.0
 */

import { Command } from 'commander'
import { DEFAULT_API_HOST, DEFAULT_MIN_ARTIFACT_BYTES, formatBytes } from '@binrelay/core'
import { ARTIFACTS, product } from '@binrelay/dymo-code'
import { auditReleaseAssets, fetchRelease } from '../lib/release-assets.js'

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
}

async function main(): Promise<number> {
  const program = new Command()
    .name('check-release')
    .option('--tag <tag>', 'release tag to check (default: latest)')
    .parse(process.argv)
  const { tag } = program.opts<{ tag?: string }>()

  const release = await fetchRelease({
    apiHost: DEFAULT_API_HOST,
    owner: product.owner,
    repo: product.repo,
    tag: tag ?? null,
    token: process.env['GITHUB_TOKEN'],
  })

  console.log(
    `${product.owner}/${product.repo} ${release.tag_name}: ${release.assets.length} assets`,
  )

  const problems = auditReleaseAssets(
    release,
    ARTIFACTS,
    DEFAULT_MIN_ARTIFACT_BYTES,
  )

  if (problems.length === 0) {
    console.log(`${colors.green}✓${colors.reset} All platforms have artifacts`)
    return 0
  }

  for (const problem of problems) {
    if (problem.type === 'missing') {
      console.error(
        `${colors.red}✗${colors.reset} ${problem.platform}: ${problem.artifact} is missing`,
      )
    } else {
      console.error(
        `${colors.yellow}⚠${colors.reset} ${problem.platform}: ${problem.artifact} ` +
          `is only ${formatBytes(problem.size)}`,
      )
    }
  }
  return 1
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err)
    process.exitCode = 1
  },
)
