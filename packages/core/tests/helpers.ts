import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createLogger, type FetchLike, type Logger } from '../src/index.js'

export type FakeFetch = {
  fetchImpl: FetchLike
  calls: string[]
}

export function createFakeFetch(
  handler: (url: string, call: number) => Response | Promise<Response>,
): FakeFetch {
  const calls: string[] = []
  const fetchImpl: FetchLike = async (input) => {
    const url = typeof input === 'string' ? input : input.toString()
    calls.push(url)
    return handler(url, calls.length)
  }
  return { fetchImpl, calls }
}

export function binaryResponse(size: number, fill = 0x7f): Response {
  return new Response(new Uint8Array(size).fill(fill), { status: 200 })
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

export function errorResponse(status: number): Response {
  return new Response('<html>error</html>', { status })
}

export function createCapturedLogger(): {
  logger: Logger
  stdout: string[]
  stderr: string[]
} {
  const stdout: string[] = []
  const stderr: string[] = []
  const logger = createLogger({
    color: false,
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
  })
  return { logger, stdout, stderr }
}

export function createRecordingSleep(): {
  sleep: (ms: number) => Promise<void>
  delays: number[]
} {
  const delays: number[] = []
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms)
    },
  }
}

export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'binrelay-test-'))
  try {
    return await fn(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}
