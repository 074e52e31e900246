import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import {
  FilesystemError,
  ensurePathEntry,
  formatPathExport,
  isOnPath,
  toShellPath,
} from '../src/index.js'
import { withTempDir } from './helpers.js'

const INSTALL_DIR = '/home/tester/.local/bin'
const EXPORT_LINE = 'export PATH="$PATH:/home/tester/.local/bin"'

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1
}

describe('formatPathExport', () => {
  it('appends the directory to PATH', () => {
    expect(formatPathExport(INSTALL_DIR)).toBe(EXPORT_LINE)
  })
})

describe('toShellPath', () => {
  it('rewrites a windows drive path for bash', () => {
    expect(toShellPath('C:\\Users\\u\\AppData\\Local/demo/bin', 'windows')).toBe(
      '/c/Users/u/AppData/Local/demo/bin',
    )
  })

  it('leaves unix paths alone', () => {
    expect(toShellPath(INSTALL_DIR, 'linux')).toBe(INSTALL_DIR)
    expect(toShellPath(INSTALL_DIR, 'windows')).toBe(INSTALL_DIR)
  })
})

describe('isOnPath', () => {
  it('matches whole entries only', () => {
    expect(isOnPath('/opt/bin', '/usr/bin:/opt/bin', ':')).toBe(true)
    expect(isOnPath('/opt/bin', '/usr/bin:/opt/bin2', ':')).toBe(false)
    expect(isOnPath('/opt/bin', undefined, ':')).toBe(false)
  })
})

describe('ensurePathEntry', () => {
  it('appends an export line to an existing startup file', async () => {
    await withTempDir(async (home) => {
      const bashrc = join(home, '.bashrc')
      await writeFile(bashrc, '# existing\n')

      const result = await ensurePathEntry({
        directory: INSTALL_DIR,
        startupFiles: [bashrc],
        env: { PATH: '/usr/bin' },
        delimiter: ':',
      })

      expect(result.appended).toEqual([bashrc])
      expect(await readFile(bashrc, 'utf-8')).toBe(`# existing\n${EXPORT_LINE}\n`)
    })
  })

  it('starts a new line when the file does not end with one', async () => {
    await withTempDir(async (home) => {
      const zshrc = join(home, '.zshrc')
      await writeFile(zshrc, 'alias ll="ls -l"')

      await ensurePathEntry({
        directory: INSTALL_DIR,
        startupFiles: [zshrc],
        env: {},
        delimiter: ':',
      })

      expect(await readFile(zshrc, 'utf-8')).toBe(
        `alias ll="ls -l"\n${EXPORT_LINE}\n`,
      )
    })
  })

  it('skips startup files that do not exist', async () => {
    await withTempDir(async (home) => {
      const zshrc = join(home, '.zshrc')

      const result = await ensurePathEntry({
        directory: INSTALL_DIR,
        startupFiles: [zshrc],
        env: {},
        delimiter: ':',
      })

      expect(result.missing).toEqual([zshrc])
      expect(result.appended).toEqual([])
      expect(existsSync(zshrc)).toBe(false)
    })
  })

  it('adds nothing to a file that already mentions the directory', async () => {
    await withTempDir(async (home) => {
      const bashrc = join(home, '.bashrc')
      const original = `export PATH="${INSTALL_DIR}:$PATH"\n`
      await writeFile(bashrc, original)

      const result = await ensurePathEntry({
        directory: INSTALL_DIR,
        startupFiles: [bashrc],
        env: {},
        delimiter: ':',
      })

      expect(result.alreadyPresent).toEqual([bashrc])
      expect(await readFile(bashrc, 'utf-8')).toBe(original)
    })
  })

  it('never duplicates the entry across runs', async () => {
    await withTempDir(async (home) => {
      const bashrc = join(home, '.bashrc')
      const zshrc = join(home, '.zshrc')
      await writeFile(bashrc, '')
      await writeFile(zshrc, '')
      const env = { PATH: '/usr/bin' }

      for (let run = 0; run < 3; run++) {
        await ensurePathEntry({
          directory: INSTALL_DIR,
          startupFiles: [bashrc, zshrc],
          env,
          delimiter: ':',
        })
      }

      expect(countOccurrences(await readFile(bashrc, 'utf-8'), EXPORT_LINE)).toBe(1)
      expect(countOccurrences(await readFile(zshrc, 'utf-8'), EXPORT_LINE)).toBe(1)
      expect(env.PATH).toBe(`/usr/bin:${INSTALL_DIR}`)
    })
  })

  it('updates the session PATH only when needed', async () => {
    const env: Record<string, string | undefined> = { PATH: `/usr/bin:${INSTALL_DIR}` }

    const result = await ensurePathEntry({
      directory: INSTALL_DIR,
      startupFiles: [],
      env,
      delimiter: ':',
    })

    expect(result.sessionUpdated).toBe(false)
    expect(env['PATH']).toBe(`/usr/bin:${INSTALL_DIR}`)
  })

  it('sets PATH when the session has none', async () => {
    const env: Record<string, string | undefined> = {}

    await ensurePathEntry({
      directory: INSTALL_DIR,
      startupFiles: [],
      env,
      delimiter: ':',
    })

    expect(env['PATH']).toBe(INSTALL_DIR)
  })

  it('writes a windows directory in a form bash can split', async () => {
    await withTempDir(async (home) => {
      const bashrc = join(home, '.bashrc')
      await writeFile(bashrc, '')
      const directory = 'C:\\Users\\u\\AppData\\Local\\demo\\bin'
      const env: Record<string, string | undefined> = {
        PATH: 'C:\\Windows\\system32',
      }

      const first = await ensurePathEntry({
        directory,
        startupFiles: [bashrc],
        env,
        delimiter: ';',
        os: 'windows',
      })
      const second = await ensurePathEntry({
        directory,
        startupFiles: [bashrc],
        env,
        delimiter: ';',
        os: 'windows',
      })

      expect(first.appended).toEqual([bashrc])
      expect(second.alreadyPresent).toEqual([bashrc])
      expect(await readFile(bashrc, 'utf-8')).toBe(
        'export PATH="$PATH:/c/Users/u/AppData/Local/demo/bin"\n',
      )
      expect(env['PATH']).toBe(`C:\\Windows\\system32;${directory}`)
    })
  })

  it('surfaces a startup file that exists but cannot be read', async () => {
    await withTempDir(async (home) => {
      const unreadable = join(home, '.bashrc')
      await mkdir(unreadable)

      await expect(
        ensurePathEntry({
          directory: INSTALL_DIR,
          startupFiles: [unreadable],
          env: {},
          delimiter: ':',
        }),
      ).rejects.toBeInstanceOf(FilesystemError)
    })
  })
})
