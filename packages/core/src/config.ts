import { z } from 'zod'
import { ConfigError } from './errors.js'

export const DEFAULT_RELEASE_HOST = 'https://github.com'
export const DEFAULT_API_HOST = 'https://api.github.com'
export const DEFAULT_MIRROR_HOST = 'https://raw.githubusercontent.com'

export const DEFAULT_MAX_PRIMARY_ATTEMPTS = 3
export const DEFAULT_RETRY_DELAY_MS = 2_000
export const DEFAULT_MIN_ARTIFACT_BYTES = 1_000_000
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000
export const DEFAULT_METADATA_TIMEOUT_MS = 10_000

const InstallerConfigSchema = z.object({
  product: z
    .string()
    .regex(/^[a-z0-9][a-z0-9._-]*$/i, 'must be a plain executable name'),
  owner: z.string().min(1),
  repo: z.string().min(1),
  releaseHost: z.string().url(),
  apiHost: z.string().url(),
  mirrorHost: z.string().url(),
  mirrorScheme: z.enum(['raw-content', 'github-raw']),
  mirrorBranch: z.string().min(1),
  mirrorDirectory: z.string(),
  version: z.string().min(1).nullable(),
  latestStrategy: z.enum(['metadata', 'redirect']),
  installDir: z.string().min(1).nullable(),
  modifyPath: z.boolean(),
  startupFiles: z.array(z.string().min(1)).nullable(),
  maxPrimaryAttempts: z.number().int().min(1).max(10),
  retryDelayMs: z.number().int().min(0),
  minArtifactBytes: z.number().int().min(0),
  requestTimeoutMs: z.number().int().positive(),
  metadataTimeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
})

export type InstallerConfig = z.infer<typeof InstallerConfigSchema>

export type LatestStrategy = InstallerConfig['latestStrategy']

export type MirrorScheme = InstallerConfig['mirrorScheme']

/**
 * The fixed facts about one distributed product. Everything else in
 * {@link InstallerConfig} has a default or comes from the environment.
 */
export type ProductDefinition = {
  name: string
  owner: string
  repo: string
  // Prefix for environment variables, e.g. DYMO_CODE -> DYMO_CODE_VERSION
  envPrefix: string
  mirrorBranch?: string
  mirrorDirectory?: string
  mirrorScheme?: MirrorScheme
}

export type ConfigOverrides = Partial<InstallerConfig>

export type Env = Record<string, string | undefined>

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '')
}

export function envOverrides(prefix: string, env: Env): ConfigOverrides {
  const overrides: ConfigOverrides = {}

  const version = readEnv(env, `${prefix}_VERSION`)
  if (version) overrides.version = version

  const installDir = readEnv(env, `${prefix}_INSTALL_DIR`)
  if (installDir) overrides.installDir = installDir

  const mirrorBranch = readEnv(env, `${prefix}_MIRROR_BRANCH`)
  if (mirrorBranch) overrides.mirrorBranch = mirrorBranch

  const releaseHost = readEnv(env, `${prefix}_DOWNLOAD_BASE_URL`)
  if (releaseHost) overrides.releaseHost = releaseHost

  if (readEnv(env, `${prefix}_NO_MODIFY_PATH`) === '1') {
    overrides.modifyPath = false
  }

  return overrides
}

/**
 * Merge defaults, environment and explicit overrides (in increasing
 * priority) and validate the result.
 */
export function resolveConfig(
  product: ProductDefinition,
  overrides: ConfigOverrides = {},
  env: Env = process.env,
): InstallerConfig {
  const defaults: InstallerConfig = {
    product: product.name,
    owner: product.owner,
    repo: product.repo,
    releaseHost: DEFAULT_RELEASE_HOST,
    apiHost: DEFAULT_API_HOST,
    mirrorHost: DEFAULT_MIRROR_HOST,
    mirrorScheme: product.mirrorScheme ?? 'raw-content',
    mirrorBranch: product.mirrorBranch ?? 'main',
    mirrorDirectory: product.mirrorDirectory ?? 'dist',
    version: null,
    latestStrategy: 'metadata',
    installDir: null,
    modifyPath: true,
    startupFiles: null,
    maxPrimaryAttempts: DEFAULT_MAX_PRIMARY_ATTEMPTS,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    minArtifactBytes: DEFAULT_MIN_ARTIFACT_BYTES,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    metadataTimeoutMs: DEFAULT_METADATA_TIMEOUT_MS,
    userAgent: `${product.name}-installer`,
  }

  const merged: Record<string, unknown> = {
    ...defaults,
    ...envOverrides(product.envPrefix, env),
  }
  // Commander hands over unset options as undefined; those keep the default
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value
  }

  const result = InstallerConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`,
      ),
    )
  }

  return {
    ...result.data,
    releaseHost: stripTrailingSlashes(result.data.releaseHost),
    apiHost: stripTrailingSlashes(result.data.apiHost),
    mirrorHost: stripTrailingSlashes(result.data.mirrorHost),
  }
}
