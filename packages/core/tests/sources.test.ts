import { describe, expect, it } from 'vitest'
import {
  buildSourceCandidates,
  describeCandidates,
  getReleasesPageUrl,
  resolveConfig,
  type ProductDefinition,
} from '../src/index.js'

const product: ProductDefinition = {
  name: 'demo',
  owner: 'acme',
  repo: 'demo',
  envPrefix: 'DEMO',
}

const ARTIFACT = 'demo-linux-x86_64'

describe('buildSourceCandidates', () => {
  const config = resolveConfig(product, {}, {})

  it('puts the tagged release before the mirror', () => {
    expect(
      buildSourceCandidates(config, ARTIFACT, { kind: 'latest', tag: 'v1.4.0' }),
    ).toEqual([
      {
        kind: 'primary',
        url: 'https://github.com/acme/demo/releases/download/v1.4.0/demo-linux-x86_64',
      },
      {
        kind: 'mirror',
        url: 'https://raw.githubusercontent.com/acme/demo/main/dist/demo-linux-x86_64',
      },
    ])
  })

  it('uses a pinned tag verbatim', () => {
    const [primary] = buildSourceCandidates(config, ARTIFACT, {
      kind: 'pinned',
      tag: '0.9.1',
    })
    expect(primary?.url).toBe(
      'https://github.com/acme/demo/releases/download/0.9.1/demo-linux-x86_64',
    )
  })

  it('addresses the latest release through its redirect', () => {
    const [primary] = buildSourceCandidates(config, ARTIFACT, {
      kind: 'latest-redirect',
    })
    expect(primary?.url).toBe(
      'https://github.com/acme/demo/releases/latest/download/demo-linux-x86_64',
    )
  })

  it('offers only the mirror when the version is unknown', () => {
    expect(
      buildSourceCandidates(config, ARTIFACT, {
        kind: 'unresolved',
        reason: 'offline',
      }),
    ).toEqual([
      {
        kind: 'mirror',
        url: 'https://raw.githubusercontent.com/acme/demo/main/dist/demo-linux-x86_64',
      },
    ])
  })

  it('supports the github raw mirror scheme', () => {
    const githubRaw = resolveConfig(
      product,
      { mirrorScheme: 'github-raw', mirrorBranch: 'release' },
      {},
    )
    const candidates = buildSourceCandidates(githubRaw, ARTIFACT, {
      kind: 'unresolved',
      reason: 'offline',
    })
    expect(candidates[0]?.url).toBe(
      'https://github.com/acme/demo/raw/refs/heads/release/dist/demo-linux-x86_64',
    )
  })

  it('drops an empty mirror directory from the path', () => {
    const flat = resolveConfig(product, { mirrorDirectory: '' }, {})
    const candidates = buildSourceCandidates(flat, ARTIFACT, {
      kind: 'unresolved',
      reason: 'offline',
    })
    expect(candidates[0]?.url).toBe(
      'https://raw.githubusercontent.com/acme/demo/main/demo-linux-x86_64',
    )
  })
})

describe('describeCandidates', () => {
  it('numbers each source with its kind', () => {
    expect(
      describeCandidates([
        { kind: 'primary', url: 'https://a.example/x' },
        { kind: 'mirror', url: 'https://b.example/x' },
      ]),
    ).toBe('1. [primary] https://a.example/x\n2. [mirror] https://b.example/x')
  })
})

describe('getReleasesPageUrl', () => {
  it('points at the repository releases', () => {
    expect(getReleasesPageUrl(resolveConfig(product, {}, {}))).toBe(
      'https://github.com/acme/demo/releases',
    )
  })
})
