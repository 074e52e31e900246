// Platform detection
export {
  type OperatingSystem,
  type Architecture,
  type PlatformKey,
  type HostIdentity,
  detectPlatform,
  readHostIdentity,
  formatPlatform,
  isSupportedPlatform,
  SUPPORTED_PLATFORMS,
} from './platform.js'

// Artifact naming
export {
  resolveArtifactName,
  getExecutableName,
  getExecutableExtension,
} from './artifact.js'

// Configuration
export {
  type InstallerConfig,
  type ConfigOverrides,
  type ProductDefinition,
  type LatestStrategy,
  type MirrorScheme,
  type Env,
  resolveConfig,
  envOverrides,
  DEFAULT_RELEASE_HOST,
  DEFAULT_API_HOST,
  DEFAULT_MIRROR_HOST,
  DEFAULT_MAX_PRIMARY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_MIN_ARTIFACT_BYTES,
} from './config.js'

// Version and source resolution
export {
  type FetchLike,
  type ReleaseVersion,
  resolveVersion,
  describeVersion,
  getLatestReleaseUrl,
} from './version.js'
export {
  type SourceCandidate,
  type SourceKind,
  buildSourceCandidates,
  getPrimaryUrl,
  getMirrorUrl,
  getReleasesPageUrl,
  describeCandidates,
} from './sources.js'

// Download utilities
export {
  type DownloadOptions,
  type DownloadResult,
  type DownloadAttempt,
  type AttemptOutcome,
  type AcquisitionResult,
  type AcquireOptions,
  downloadFile,
  acquireArtifact,
  formatBytes,
  createProgressReporter,
} from './download.js'

// Installation
export {
  type InstalledArtifact,
  ensureInstallDir,
  makeExecutable,
  installArtifact,
} from './install.js'
export {
  type InstallDirOptions,
  getInstallDir,
  getInstallPath,
  getStagingPath,
  defaultStartupFiles,
} from './paths.js'
export {
  type PathRegistration,
  ensurePathEntry,
  formatPathExport,
  isOnPath,
  toShellPath,
} from './path-registry.js'

// Manual fallback
export {
  type Prompt,
  type UrlOpener,
  type ManualFallbackOptions,
  runManualFallback,
  createTerminalPrompt,
  createUrlOpener,
  getOpenCommand,
} from './fallback.js'

// Pipeline
export {
  type InstallerDependencies,
  type InstallReport,
  runInstaller,
} from './pipeline.js'

// Errors and logging
export {
  InstallerError,
  UnsupportedPlatformError,
  ConfigError,
  FilesystemError,
  ManualCompletionRequiredError,
  DownloadError,
  describeError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_MANUAL_COMPLETION,
} from './errors.js'
export {
  type Logger,
  type LoggerOptions,
  type WritableText,
  createLogger,
  silentLogger,
} from './logger.js'
