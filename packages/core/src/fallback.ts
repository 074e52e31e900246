import { spawn } from 'node:child_process'
import { once } from 'node:events'
import { createInterface } from 'node:readline'
import { describeError } from './errors.js'
import type { Logger } from './logger.js'
import type { OperatingSystem } from './platform.js'

export type Prompt = (question: string) => Promise<void>

export type UrlOpener = (url: string) => Promise<void>

export function getOpenCommand(
  os: OperatingSystem,
  url: string,
): { command: string; args: string[] } {
  switch (os) {
    case 'macos':
      return { command: 'open', args: [url] }
    case 'windows':
      return { command: 'cmd', args: ['/c', 'start', '', url] }
    case 'linux':
      return { command: 'xdg-open', args: [url] }
  }
}

export function createUrlOpener(os: OperatingSystem): UrlOpener {
  return (url) =>
    new Promise<void>((resolve, reject) => {
      const { command, args } = getOpenCommand(os, url)
      const child = spawn(command, args, { stdio: 'ignore', detached: true })
      child.once('error', reject)
      child.once('spawn', () => {
        child.unref()
        resolve()
      })
    })
}

/**
 * Waits for Enter on stdin. Without a terminal there is nobody to answer,
 * so it returns straight away instead of blocking a piped install. End of
 * input (Ctrl-D) counts as an answer.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompt {
  return async (question) => {
    if (!input.isTTY) return

    const rl = createInterface({ input, output })
    try {
      output.write(question)
      await Promise.race([once(rl, 'line'), once(rl, 'close')])
    } finally {
      rl.close()
    }
  }
}

export type ManualFallbackOptions = {
  url: string
  destination: string
  attempts: number
  prompt: Prompt
  openUrl: UrlOpener
  logger: Logger
}

/**
 * Hand the install over to the user once every automated source has
 * failed: show where to get the artifact and where it must go, wait for
 * acknowledgement, then try to open the URL in the default browser.
 */
export async function runManualFallback(
  options: ManualFallbackOptions,
): Promise<void> {
  const { url, destination, attempts, prompt, openUrl, logger } = options

  logger.error(`Automatic download failed after ${attempts} attempts.`)
  logger.info('Download the file manually:')
  logger.info(`  URL:         ${url}`)
  logger.info(`  Save it as:  ${destination}`)

  await prompt('Press Enter to open the download page in your browser...')

  try {
    await openUrl(url)
  } catch (error) {
    logger.warn(
      `Could not open a browser (${describeError(error)}); use the URL above.`,
    )
  }
}
