import {
  SUPPORTED_PLATFORMS,
  formatPlatform,
  resolveArtifactName,
  resolveConfig,
  runInstaller,
  type ConfigOverrides,
  type Env,
  type InstallReport,
  type InstallerConfig,
  type InstallerDependencies,
  type ProductDefinition,
} from '@binrelay/core'

export const PRODUCT_NAME = 'dymo-code'
export const PRODUCT_DISPLAY_NAME = 'Dymo Code'
export const ENV_PREFIX = 'DYMO_CODE'

export const product: ProductDefinition = {
  name: PRODUCT_NAME,
  owner: 'TPEOficial',
  repo: 'dymo-code',
  envPrefix: ENV_PREFIX,
  mirrorBranch: 'main',
  mirrorDirectory: 'dist',
  mirrorScheme: 'raw-content',
}

// Artifact published for each supported platform, keyed by `<os>-<arch>`
export const ARTIFACTS: Record<string, string> = Object.fromEntries(
  SUPPORTED_PLATFORMS.map((key) => [
    formatPlatform(key),
    resolveArtifactName(PRODUCT_NAME, key),
  ]),
)

export function createConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
): InstallerConfig {
  return resolveConfig(product, overrides, env)
}

export async function install(
  overrides: ConfigOverrides = {},
  deps: InstallerDependencies = {},
): Promise<InstallReport> {
  return runInstaller(createConfig(overrides, deps.env), deps)
}
