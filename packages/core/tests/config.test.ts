import { describe, expect, it } from 'vitest'
import { ConfigError, resolveConfig, type ProductDefinition } from '../src/index.js'

const product: ProductDefinition = {
  name: 'demo',
  owner: 'acme',
  repo: 'demo',
  envPrefix: 'DEMO',
}

describe('resolveConfig', () => {
  it('fills in the installer defaults', () => {
    const config = resolveConfig(product, {}, {})

    expect(config).toMatchObject({
      product: 'demo',
      releaseHost: 'https://github.com',
      apiHost: 'https://api.github.com',
      mirrorHost: 'https://raw.githubusercontent.com',
      mirrorScheme: 'raw-content',
      mirrorBranch: 'main',
      mirrorDirectory: 'dist',
      version: null,
      latestStrategy: 'metadata',
      installDir: null,
      modifyPath: true,
      maxPrimaryAttempts: 3,
      retryDelayMs: 2000,
      minArtifactBytes: 1_000_000,
      userAgent: 'demo-installer',
    })
  })

  it('reads prefixed environment variables', () => {
    const config = resolveConfig(product, {}, {
      DEMO_VERSION: 'v1.2.0',
      DEMO_INSTALL_DIR: '/opt/demo/bin',
      DEMO_MIRROR_BRANCH: 'stable',
      DEMO_DOWNLOAD_BASE_URL: 'https://releases.example.com//',
      DEMO_NO_MODIFY_PATH: '1',
    })

    expect(config.version).toBe('v1.2.0')
    expect(config.installDir).toBe('/opt/demo/bin')
    expect(config.mirrorBranch).toBe('stable')
    expect(config.releaseHost).toBe('https://releases.example.com')
    expect(config.modifyPath).toBe(false)
  })

  it('treats blank environment values as unset', () => {
    const config = resolveConfig(product, {}, { DEMO_VERSION: '   ' })
    expect(config.version).toBeNull()
  })

  it('lets explicit overrides beat the environment', () => {
    const config = resolveConfig(
      product,
      { version: 'v2.0.0', installDir: undefined },
      { DEMO_VERSION: 'v1.0.0', DEMO_INSTALL_DIR: '/from/env' },
    )

    expect(config.version).toBe('v2.0.0')
    expect(config.installDir).toBe('/from/env')
  })

  it('rejects invalid values with the offending key', () => {
    let caught: unknown
    try {
      resolveConfig(product, { maxPrimaryAttempts: 0 }, {})
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigError)
    expect(caught instanceof ConfigError && caught.issues[0]).toMatch(
      /^maxPrimaryAttempts: /,
    )
  })

  it('rejects a download host that is not a URL', () => {
    expect(() =>
      resolveConfig(product, {}, { DEMO_DOWNLOAD_BASE_URL: 'not a url' }),
    ).toThrow(ConfigError)
  })
})
