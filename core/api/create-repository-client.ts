import type { Logger } from 'pino'

import type { RepositoryClientContext } from '../../types/repository-client-context'
import type { RepositoryConfig } from '../../types/repository-config'
import type { RepositoryClient } from '../../types/repository-client'

import { getLatestPrerelease } from './get-latest-prerelease'
import { createLogger } from '../logging/create-logger'
import { getLatestRelease } from './get-latest-release'
import { listPrereleases } from './list-prereleases'
import { createRelease } from './create-release'
import { createBranch } from './create-branch'
import { compareRefs } from './compare-refs'
import { getRelease } from './get-release'
import { getBranch } from './get-branch'

/**
 * Create a client bound to one repository.
 *
 * Requests authenticate with HTTP basic auth (login and token) against
 * `<apiRoot>/repos/<owner>/<repo>/`.
 *
 * @param config - Repository coordinates and credentials.
 * @param logger - Diagnostic logger, silent by default.
 * @returns Client with bound methods.
 */
export function createRepositoryClient(
  config: RepositoryConfig,
  logger: Logger = createLogger('silent'),
): RepositoryClient {
  let credentials = Buffer.from(`${config.user}:${config.token}`).toString(
    'base64',
  )
  let apiRoot = config.apiRoot.replace(/\/+$/u, '')

  let context: RepositoryClientContext = {
    baseUrl: `${apiRoot}/repos/${config.owner}/${config.repo}/`,
    authorization: `Basic ${credentials}`,
    rateLimitReset: new Date(),
    rateLimitRemaining: 5000,
    logger,
  }

  return {
    getRateLimitStatus: () => ({
      remaining: context.rateLimitRemaining,
      resetAt: context.rateLimitReset,
    }),
    createBranch: (name, sha) => createBranch(context, name, sha),
    listPrereleases: limit => listPrereleases(context, limit),
    compare: (base, head) => compareRefs(context, base, head),
    createRelease: release => createRelease(context, release),
    latestPrerelease: () => getLatestPrerelease(context),
    latestRelease: () => getLatestRelease(context),
    getRelease: tag => getRelease(context, tag),
    getBranch: name => getBranch(context, name),
  }
}
