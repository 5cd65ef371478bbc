import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

import type { RepositoryConfig } from '../../types/repository-config'

import { resolveGitHubTokenSync } from '../api/resolve-github-token-sync'
import { ReleaseError } from '../errors/release-error'
import { readIniSection } from './read-ini-section'

/** Name of the rc file looked up in the home and working directories. */
export const CONFIG_FILE_NAME = '.releasetrainrc'

/** Default GitHub REST API root. */
export const DEFAULT_API_ROOT = 'https://api.github.com'

/** Prefix of the environment variables overriding config keys. */
export const ENV_PREFIX = 'RELEASE_TRAIN_'

const CONFIG_KEYS = ['API_ROOT', 'TOKEN', 'OWNER', 'USER', 'REPO'] as const

type ConfigKey = (typeof CONFIG_KEYS)[number]

interface LoadConfigOptions {
  /** Environment to read overrides from. */
  env?: NodeJS.ProcessEnv

  /** Extra config file, read last. */
  path?: string

  /** Home directory. */
  home?: string

  /** Working directory. */
  cwd?: string
}

/**
 * Load repository configuration.
 *
 * Reads the `[repo]` section of `~/.releasetrainrc`, `./.releasetrainrc` and
 * the explicit `path`, later files overriding earlier ones, then applies
 * `RELEASE_TRAIN_*` environment variables. A missing token falls back to the
 * usual GitHub token sources.
 *
 * @param options - Directories, environment and explicit config path.
 * @returns Complete configuration.
 * @throws {ReleaseError} `invalid-config` when the explicit file is missing or
 *   a required value is not set anywhere.
 */
export function loadConfig(options: LoadConfigOptions = {}): RepositoryConfig {
  let {
    cwd = process.cwd(),
    env = process.env,
    home = homedir(),
    path,
  } = options

  let values: Partial<Record<ConfigKey, string>> = {}
  let apply = (source: Record<string, string>): void => {
    for (let key of CONFIG_KEYS) {
      let value = source[key]
      if (value) {
        values[key] = value
      }
    }
  }

  for (let file of [join(home, CONFIG_FILE_NAME), join(cwd, CONFIG_FILE_NAME)]) {
    let content = readOptionalFile(file)
    if (content !== null) {
      apply(readIniSection(content, 'repo'))
    }
  }

  if (path) {
    let content = readOptionalFile(path)
    if (content === null) {
      throw new ReleaseError('invalid-config', `Config file ${path} not found`)
    }
    apply(readIniSection(content, 'repo'))
  }

  let overrides: Record<string, string> = {}
  for (let key of CONFIG_KEYS) {
    let value = env[`${ENV_PREFIX}${key}`]?.trim()
    if (value) {
      overrides[key] = value
    }
  }
  apply(overrides)

  values.TOKEN ??= resolveGitHubTokenSync(env, cwd)

  let { TOKEN: token, OWNER: owner, USER: user, REPO: repo } = values
  if (!user || !token || !owner || !repo) {
    let missing = (['USER', 'TOKEN', 'OWNER', 'REPO'] as const).filter(
      key => !values[key],
    )
    throw new ReleaseError(
      'invalid-config',
      `Missing ${missing.join(', ')} in [repo] section of ${CONFIG_FILE_NAME} ` +
        `or RELEASE_TRAIN_* environment variables`,
    )
  }

  return {
    apiRoot: values.API_ROOT ?? DEFAULT_API_ROOT,
    owner,
    token,
    user,
    repo,
  }
}

/**
 * Read a file, treating a missing file as absent.
 *
 * @param file - File path.
 * @returns File content or null when it does not exist.
 */
function readOptionalFile(file: string): string | null {
  try {
    return readFileSync(file, 'utf8')
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'ENOENT'
    ) {
      return null
    }
    throw error
  }
}
