import { mkdir, open, rm, stat, type FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { setTimeout as delay } from 'node:timers/promises'
import { DownloadError, describeError } from './errors.js'
import type { Logger } from './logger.js'
import type { SourceCandidate } from './sources.js'
import type { FetchLike } from './version.js'

export type DownloadOptions = {
  url: string
  destination: string
  fetchImpl?: FetchLike
  userAgent?: string
  timeoutMs?: number
  onProgress?: (downloaded: number, total: number) => void
}

export type DownloadResult = {
  path: string
  size: number
}

export async function downloadFile(
  options: DownloadOptions,
): Promise<DownloadResult> {
  const {
    url,
    destination,
    fetchImpl = fetch,
    userAgent = 'binrelay',
    timeoutMs,
    onProgress,
  } = options

  await mkdir(dirname(destination), { recursive: true })

  let response: Response
  try {
    response = await fetchImpl(url, {
      headers: {
        'User-Agent': userAgent,
      },
      redirect: 'follow',
      signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined,
    })
  } catch (error) {
    throw new DownloadError(
      `Request to ${url} failed: ${describeError(error)}`,
      url,
    )
  }

  if (!response.ok) {
    throw new DownloadError(
      `Failed to download ${url}: ${response.status} ${response.statusText}`.trim(),
      url,
      response.status,
    )
  }

  if (!response.body) {
    throw new DownloadError(`No response body received from ${url}`, url)
  }

  const total = Number(response.headers.get('content-length')) || 0
  let downloaded = 0

  const body = response.body
  let file: FileHandle
  try {
    file = await open(destination, 'w')
  } catch (error) {
    await Promise.allSettled([body.cancel(error)])
    throw error
  }

  const reader = body.getReader()
  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      await file.write(value)
      downloaded += value.byteLength
      onProgress?.(downloaded, total)
    }
  } catch (error) {
    // Release the connection before the next attempt opens another one
    await Promise.allSettled([reader.cancel(error), file.close()])
    await rm(destination, { force: true })
    throw new DownloadError(
      `Download from ${url} was interrupted: ${describeError(error)}`,
      url,
    )
  }

  await file.close()

  return {
    path: destination,
    size: downloaded,
  }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB']
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(k)),
    sizes.length - 1,
  )
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}

export function createProgressReporter(
  logger: Logger,
  options: { prefix?: string } = {},
): (downloaded: number, total: number) => void {
  const { prefix = '' } = options
  let lastPercent = -1

  return (downloaded: number, total: number) => {
    const percent = total > 0 ? Math.round((downloaded / total) * 100) : 0

    if (percent !== lastPercent) {
      lastPercent = percent
      const downloadedStr = formatBytes(downloaded)
      const totalStr = total > 0 ? formatBytes(total) : 'unknown'
      logger.progress(
        `${prefix}Downloading... ${percent}% (${downloadedStr}/${totalStr})`,
      )
    }
  }
}

export type AttemptOutcome =
  | 'success'
  | 'transient_failure'
  | 'rejected_small_file'

export type DownloadAttempt = {
  candidate: SourceCandidate
  attempt: number
  outcome: AttemptOutcome
  sizeBytes: number
  error?: string
}

export type AcquisitionResult =
  | {
      status: 'success'
      path: string
      sizeBytes: number
      candidate: SourceCandidate
      attempts: DownloadAttempt[]
    }
  | {
      status: 'exhausted'
      attempts: DownloadAttempt[]
    }

export type AcquireOptions = {
  candidates: SourceCandidate[]
  // Where each attempt writes; never the final install path
  stagingPath: string
  maxPrimaryAttempts: number
  retryDelayMs: number
  minArtifactBytes: number
  requestTimeoutMs?: number
  userAgent?: string
  fetchImpl?: FetchLike
  sleep?: (ms: number) => Promise<void>
  logger: Logger
}

async function fileSize(path: string): Promise<number | null> {
  try {
    const stats = await stat(path)
    return stats.isFile() ? stats.size : null
  } catch {
    return null
  }
}

function attemptsFor(candidate: SourceCandidate, maxPrimaryAttempts: number): number {
  return candidate.kind === 'primary' ? maxPrimaryAttempts : 1
}

async function runAttempt(
  candidate: SourceCandidate,
  attempt: number,
  options: AcquireOptions,
): Promise<DownloadAttempt> {
  const { stagingPath, minArtifactBytes, logger } = options

  await rm(stagingPath, { force: true })

  try {
    await downloadFile({
      url: candidate.url,
      destination: stagingPath,
      fetchImpl: options.fetchImpl,
      userAgent: options.userAgent,
      timeoutMs: options.requestTimeoutMs,
      onProgress: createProgressReporter(logger),
    })
  } catch (error) {
    logger.endProgress()
    await rm(stagingPath, { force: true })
    return {
      candidate,
      attempt,
      outcome: 'transient_failure',
      sizeBytes: 0,
      error: describeError(error),
    }
  }
  logger.endProgress()

  const size = await fileSize(stagingPath)
  if (size === null || size < minArtifactBytes) {
    await rm(stagingPath, { force: true })
    return {
      candidate,
      attempt,
      outcome: 'rejected_small_file',
      sizeBytes: size ?? 0,
      error:
        `received ${formatBytes(size ?? 0)}, expected at least ` +
        `${formatBytes(minArtifactBytes)}`,
    }
  }

  return { candidate, attempt, outcome: 'success', sizeBytes: size }
}

/**
 * Walk the candidates in order: the primary source gets up to
 * `maxPrimaryAttempts` tries with a fixed delay between them, a mirror gets
 * a single try. Transport errors and undersized files both use up an
 * attempt, and a rejected file is removed before the next one starts.
 */
export async function acquireArtifact(
  options: AcquireOptions,
): Promise<AcquisitionResult> {
  const {
    candidates,
    maxPrimaryAttempts,
    retryDelayMs,
    sleep = (ms: number) => delay(ms),
    logger,
  } = options
  const attempts: DownloadAttempt[] = []

  for (const candidate of candidates) {
    const budget = attemptsFor(candidate, maxPrimaryAttempts)

    for (let attempt = 1; attempt <= budget; attempt++) {
      logger.step(
        `Downloading from ${candidate.kind} (attempt ${attempt}/${budget}): ${candidate.url}`,
      )

      const result = await runAttempt(candidate, attempt, options)
      attempts.push(result)

      if (result.outcome === 'success') {
        logger.success(`Downloaded ${formatBytes(result.sizeBytes)}`)
        return {
          status: 'success',
          path: options.stagingPath,
          sizeBytes: result.sizeBytes,
          candidate,
          attempts,
        }
      }

      logger.warn(
        `Attempt ${attempt}/${budget} against ${candidate.kind} failed: ${result.error ?? result.outcome}`,
      )

      if (attempt < budget) {
        logger.debug(`Retrying in ${retryDelayMs}ms`)
        await sleep(retryDelayMs)
      }
    }
  }

  return { status: 'exhausted', attempts }
}
