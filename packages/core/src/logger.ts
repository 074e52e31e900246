export type WritableText = {
  write(chunk: string): unknown
  isTTY?: boolean
}

export type LoggerOptions = {
  prefix?: string
  quiet?: boolean
  verbose?: boolean
  color?: boolean
  stdout?: WritableText
  stderr?: WritableText
}

export type Logger = {
  step(message: string): void
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  debug(message: string): void
  // Rewrites the current line (progress output); no-op when not a TTY
  progress(message: string): void
  // Ends a progress line started with progress()
  endProgress(): void
}

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
}

type Color = keyof typeof colors

function shouldUseColor(stream: WritableText): boolean {
  if (process.env['NO_COLOR']) return false
  return stream.isTTY === true
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    prefix,
    quiet = false,
    verbose = false,
    stdout = process.stdout,
    stderr = process.stderr,
  } = options
  const color = options.color ?? shouldUseColor(stdout)
  const label = prefix ? `[${prefix}] ` : ''
  let progressActive = false

  function paint(text: string, tint: Color): string {
    return color ? `${colors[tint]}${text}${colors.reset}` : text
  }

  function write(stream: WritableText, line: string): void {
    if (progressActive) {
      stdout.write('\n')
      progressActive = false
    }
    stream.write(`${label}${line}\n`)
  }

  return {
    step(message) {
      if (!quiet) write(stdout, `${paint('▶', 'cyan')} ${message}`)
    },
    info(message) {
      if (!quiet) write(stdout, message)
    },
    success(message) {
      if (!quiet) write(stdout, `${paint('✓', 'green')} ${message}`)
    },
    warn(message) {
      if (!quiet) write(stderr, `${paint('⚠', 'yellow')} ${message}`)
    },
    error(message) {
      write(stderr, `${paint('✗', 'red')} ${message}`)
    },
    debug(message) {
      if (verbose && !quiet) write(stderr, paint(message, 'dim'))
    },
    progress(message) {
      if (quiet || stdout.isTTY !== true) return
      stdout.write(`\r${label}${message}`)
      progressActive = true
    },
    endProgress() {
      if (progressActive) {
        stdout.write('\n')
        progressActive = false
      }
    },
  }
}

export const silentLogger: Logger = createLogger({
  quiet: true,
  stderr: { write: () => true },
})
