import { randomUUID } from 'node:crypto'
import { access, chmod, copyFile, mkdir, mkdtemp, readdir, rm, stat } from 'node:fs/promises'
import { tmpdir as osTmpdir } from 'node:os'
import { basename, join } from 'node:path'

import { ScopeError, errorMessage, hasErrorCode } from '../core/errors.js'
import { logger as defaultLogger } from '../core/logger.js'
import type { Logger } from '../core/types.js'

export const DEFAULT_PFILES_VAR = 'PFILES'

/**
 * The two-part parameter search path: private (user) directories, then the
 * shared system directories.
 */
export interface PfilesPath {
  user: string[]
  system: string[]
}

function splitDirs(part: string): string[] {
  return part
    .split(':')
    .map((dir) => dir.trim())
    .filter(Boolean)
}

/** Parses `<user dirs>;<system dirs>`; a value with no `;` is all system. */
export function parsePfiles(value: string | undefined): PfilesPath {
  if (!value) return { user: [], system: [] }
  const index = value.indexOf(';')
  if (index === -1) return { user: [], system: splitDirs(value) }
  return { user: splitDirs(value.slice(0, index)), system: splitDirs(value.slice(index + 1)) }
}

export function formatPfiles(path: PfilesPath): string {
  return `${path.user.join(':')};${path.system.join(':')}`
}

export interface ScopeOptions {
  /** Parameter files (by tool name) that must be copied into the scope. */
  seeds?: string[]
  /** Also copy user parameter files that have no system counterpart. */
  copyUser?: boolean
  /** Use this directory instead of a fresh temporary one. */
  dirname?: string
}

export interface ScopeManagerOptions {
  /** Environment whose variable is redirected; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv
  variable?: string
  tmpdir?: string
  logger?: Logger
}

/**
 * An active private parameter directory. `env` is a copy of the
 * environment pointing at it, for passing to a child process directly.
 */
export interface PfilesScope {
  readonly id: string
  readonly dir: string
  readonly env: NodeJS.ProcessEnv
  readonly previous: string | undefined
  readonly copied: readonly string[]
  /** False when `dirname` named an existing directory, which is kept on exit. */
  readonly owned: boolean
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return false
    throw error
  }
}

async function findParFile(dirs: readonly string[], name: string): Promise<string | undefined> {
  for (const dir of dirs) {
    const candidate = join(dir, `${name}.par`)
    if (await exists(candidate)) return candidate
  }
  return undefined
}

/**
 * Creates and tears down private parameter directories.
 *
 * Entering a scope points the search-path variable at a new directory,
 * followed by the unchanged system directories; exiting restores the
 * previous value and removes the directory. Scopes on one manager nest
 * and must be exited innermost first. For scopes that run side by side,
 * give each its own manager and pass `scope.env` to the runner.
 */
export class ScopeManager {
  private readonly env: NodeJS.ProcessEnv
  private readonly variable: string
  private readonly tmpdir: string
  private readonly logger: Logger
  private readonly active: PfilesScope[] = []

  constructor(options: ScopeManagerOptions = {}) {
    this.env = options.env ?? process.env
    this.variable = options.variable ?? DEFAULT_PFILES_VAR
    this.tmpdir = options.tmpdir ?? osTmpdir()
    this.logger = options.logger ?? defaultLogger
  }

  /** Number of scopes currently entered on this manager. */
  get depth(): number {
    return this.active.length
  }

  async enter(options: ScopeOptions = {}): Promise<PfilesScope> {
    const searched = this.env[this.variable]
    const current = parsePfiles(searched)

    let dir: string
    let owned = true
    try {
      if (options.dirname) {
        dir = options.dirname
        owned = !(await exists(dir))
        await mkdir(dir, { recursive: true })
      } else {
        dir = await mkdtemp(join(this.tmpdir, 'pfiles-'))
      }
    } catch (error) {
      throw new ScopeError(`Unable to create a parameter directory in ${options.dirname ?? this.tmpdir}: ${errorMessage(error)}`)
    }

    const copied: string[] = []
    try {
      for (const seed of options.seeds ?? []) {
        const source = await findParFile([...current.user, ...current.system], seed)
        if (!source) {
          throw new ScopeError(`Unable to find the ${seed} parameter file in ${this.variable}=${searched ?? ''}`)
        }
        await this.copyInto(source, dir)
        copied.push(seed)
      }

      if (options.copyUser) {
        copied.push(...(await this.copyUserFiles(current, dir, new Set(copied))))
      }
    } catch (error) {
      if (owned) await this.removeDir(dir)
      if (error instanceof ScopeError) throw error
      throw new ScopeError(`Unable to populate parameter directory ${dir}: ${errorMessage(error)}`)
    }

    // Read after the last await: a concurrent enter() may have moved it.
    const previous = this.env[this.variable]
    const value = formatPfiles({ user: [dir], system: parsePfiles(previous).system })
    const scope: PfilesScope = {
      id: randomUUID(),
      dir,
      env: { ...this.env, [this.variable]: value },
      previous,
      copied,
      owned
    }
    this.env[this.variable] = value
    this.active.push(scope)
    this.logger.info('scope.enter', { dir, variable: this.variable, copied, depth: this.active.length })
    return scope
  }

  async exit(scope: PfilesScope): Promise<void> {
    const top = this.active[this.active.length - 1]
    if (top?.id !== scope.id) {
      throw new ScopeError(`Parameter scopes must be exited innermost first (${scope.dir})`)
    }
    this.active.pop()

    if (scope.previous === undefined) delete this.env[this.variable]
    else this.env[this.variable] = scope.previous

    if (scope.owned) await this.removeDir(scope.dir)
    this.logger.info('scope.exit', { dir: scope.dir, depth: this.active.length })
  }

  /** Runs `fn` inside a new scope, exiting it however `fn` finishes. */
  async withScope<T>(options: ScopeOptions, fn: (scope: PfilesScope) => Promise<T>): Promise<T> {
    const scope = await this.enter(options)
    try {
      return await fn(scope)
    } finally {
      await this.exit(scope)
    }
  }

  private async copyInto(source: string, dir: string): Promise<string> {
    const target = join(dir, basename(source))
    await copyFile(source, target)
    const mode = (await stat(target)).mode
    await chmod(target, (mode & 0o777) | 0o600)
    return target
  }

  private async copyUserFiles(current: PfilesPath, dir: string, skip: ReadonlySet<string>): Promise<string[]> {
    const copied: string[] = []
    for (const userDir of current.user) {
      let names: string[]
      try {
        names = await readdir(userDir)
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error
        this.logger.debug('scope.user_dir_missing', { dir: userDir })
        continue
      }

      for (const filename of names.filter((name) => name.endsWith('.par')).sort()) {
        const tool = basename(filename, '.par')
        if (skip.has(tool) || copied.includes(tool)) continue
        if (await findParFile(current.system, tool)) continue
        try {
          await this.copyInto(join(userDir, filename), dir)
          copied.push(tool)
        } catch (error) {
          // Another process may remove its files while we scan.
          if (!hasErrorCode(error, 'ENOENT')) throw error
          this.logger.debug('scope.copy_vanished', { file: join(userDir, filename) })
        }
      }
    }
    return copied
  }

  private async removeDir(dir: string): Promise<void> {
    try {
      await rm(dir, { recursive: true, force: true })
    } catch (error) {
      this.logger.warn('scope.cleanup_failed', { dir, error: errorMessage(error) })
    }
  }
}
