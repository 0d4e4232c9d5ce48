import { accessSync, constants, statSync } from 'node:fs'
import path from 'node:path'
import process from 'node:process'

export interface FindExecutableOptions {
  env?: NodeJS.ProcessEnv
  extensions?: string[]
  skipDirs?: string[]
  includeGlobalPaths?: boolean
}

/**
 * Find an executable in PATH, followed by the usual global npm install
 * locations. Returns the first path that exists.
 */
export function findExecutable(
  command: string,
  options: FindExecutableOptions = {},
): string | null {
  const {
    env = process.env,
    extensions = process.platform === 'win32' ? ['.cmd', '.exe', '.bat', ''] : [''],
    skipDirs = [],
    includeGlobalPaths = true,
  } = options

  const pathEnv = env.PATH || env.Path || ''
  const pathDirs = pathEnv.split(path.delimiter).filter(Boolean)
  const searchDirs = includeGlobalPaths ? [...pathDirs, ...getGlobalNodePaths(env)] : pathDirs

  for (const dir of searchDirs) {
    if (skipDirs.some(skipDir => dir.includes(skipDir))) {
      continue
    }

    for (const ext of extensions) {
      const fullPath = path.join(dir, command + ext)
      if (isExecutableFile(fullPath)) {
        return fullPath
      }
    }
  }
  return null
}

/**
 * A regular file the current user may run. Windows has no execute bit, so
 * existence is enough there.
 */
export function isExecutableFile(fullPath: string): boolean {
  try {
    if (!statSync(fullPath).isFile()) {
      return false
    }
    accessSync(fullPath, process.platform === 'win32' ? constants.F_OK : constants.X_OK)
    return true
  }
  catch {
    return false
  }
}

/**
 * Platform-specific global Node.js bin directories (npm prefix, nvm, n)
 */
export function getGlobalNodePaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const paths: string[] = []

  if (process.platform === 'win32') {
    if (env.APPDATA) {
      paths.push(path.join(env.APPDATA, 'npm'))
    }
    if (env.ProgramFiles) {
      paths.push(path.join(env.ProgramFiles, 'nodejs'))
    }
  }
  else {
    paths.push('/usr/local/bin')
    paths.push('/opt/homebrew/bin') // Homebrew on Apple Silicon

    if (env.NVM_BIN) {
      paths.push(env.NVM_BIN)
    }
    if (env.N_PREFIX) {
      paths.push(path.join(env.N_PREFIX, 'bin'))
    }
    if (env.HOME) {
      paths.push(path.join(env.HOME, '.npm-global', 'bin'))
    }
  }

  return paths
}
