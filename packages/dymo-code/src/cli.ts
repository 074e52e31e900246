import { Command, CommanderError, Option } from 'commander'
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  createLogger,
  describeError,
  exitCodeFor,
  formatPathExport,
  type ConfigOverrides,
  type HostIdentity,
  type InstallerDependencies,
  type LatestStrategy,
  type MirrorScheme,
} from '@binrelay/core'
import { PRODUCT_DISPLAY_NAME, PRODUCT_NAME, install } from './index.js'

type CliOptions = {
  release?: string
  installDir?: string
  mirrorBranch?: string
  mirrorScheme?: MirrorScheme
  latestStrategy?: LatestStrategy
  platform?: string
  modifyPath: boolean
  quiet: boolean
  verbose: boolean
}

export function createProgram(): Command {
  return new Command()
    .name(`${PRODUCT_NAME}-install`)
    .description(
      `Download the ${PRODUCT_DISPLAY_NAME} binary for this machine and put it on your PATH`,
    )
    .option(
      '-r, --release <tag>',
      'install this release tag instead of the latest (env: DYMO_CODE_VERSION)',
    )
    .option(
      '--install-dir <dir>',
      'directory to install into (env: DYMO_CODE_INSTALL_DIR)',
    )
    .option(
      '--mirror-branch <branch>',
      'branch the mirror copy is read from (env: DYMO_CODE_MIRROR_BRANCH)',
    )
    .addOption(
      new Option('--mirror-scheme <scheme>', 'how the mirror is addressed').choices([
        'raw-content',
        'github-raw',
      ]),
    )
    .addOption(
      new Option(
        '--latest-strategy <strategy>',
        'look the latest tag up via the API, or use the latest-release redirect',
      ).choices(['metadata', 'redirect']),
    )
    .option(
      '--platform <kernel/machine>',
      'install for this platform instead of the detected one, e.g. Linux/x86_64',
    )
    .option('--no-modify-path', 'do not touch shell startup files')
    .option('-q, --quiet', 'only print errors', false)
    .option('--verbose', 'print debugging output', false)
    .exitOverride()
}

export function parsePlatformOverride(value: string): HostIdentity {
  const [kernelName, machine, ...rest] = value.split('/')
  if (!kernelName || !machine || rest.length > 0) {
    throw new Error(
      `Invalid --platform value "${value}": expected <kernel>/<machine>, e.g. Linux/x86_64`,
    )
  }
  return { kernelName, machine }
}

export function toConfigOverrides(options: CliOptions): ConfigOverrides {
  return {
    version: options.release,
    installDir: options.installDir,
    mirrorBranch: options.mirrorBranch,
    mirrorScheme: options.mirrorScheme,
    latestStrategy: options.latestStrategy,
    // Only an explicit --no-modify-path overrides the environment
    modifyPath: options.modifyPath ? undefined : false,
  }
}

/**
 * Parse arguments, run the installer and return the process exit code:
 * 0 on success, 2 when the user has to finish the download by hand,
 * 1 for everything else.
 */
export async function main(
  argv: string[] = process.argv,
  deps: InstallerDependencies = {},
): Promise<number> {
  const program = createProgram()

  try {
    program.parse(argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit with 0, usage errors with 1
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_FAILURE
    }
    throw error
  }

  const options = program.opts<CliOptions>()
  const logger =
    deps.logger ??
    createLogger({
      prefix: PRODUCT_NAME,
      quiet: options.quiet,
      verbose: options.verbose,
    })

  try {
    const identity = options.platform
      ? parsePlatformOverride(options.platform)
      : deps.identity

    const report = await install(toConfigOverrides(options), {
      ...deps,
      identity,
      logger,
    })

    if (report.path?.sessionUpdated && report.path.appended.length > 0) {
      logger.info(
        `Open a new shell, or run: ${formatPathExport(report.path.directory)}`,
      )
    }
    logger.success(`Installed successfully. Run: ${PRODUCT_NAME}`)
    return EXIT_SUCCESS
  } catch (error) {
    logger.error(describeError(error))
    return exitCodeFor(error)
  }
}
