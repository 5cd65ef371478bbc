import type { Mocked } from 'vitest'

import { vi } from 'vitest'
import { pino } from 'pino'

import type { ReleaseWorkflowContext } from '../../types/release-workflow-context'
import type { Comparison, ComparisonStatus } from '../../types/comparison'
import type { RepositoryClient } from '../../types/repository-client'
import type { ReleaseInfo } from '../../types/release-info'
import type { BranchRef } from '../../types/branch-ref'

import { ReleaseError } from '../../core/errors/release-error'

export function notFound(): Promise<never> {
  return Promise.reject(new ReleaseError('not-found', 'Not found'))
}

export function branch(name: string, sha: string): BranchRef {
  return {
    url: `https://api.github.com/repos/o/r/git/refs/heads/${name}`,
    name,
    sha,
  }
}

export function release(
  tagName: string,
  overrides: Partial<ReleaseInfo> = {},
): ReleaseInfo {
  return {
    url: `https://github.com/o/r/releases/tag/${tagName}`,
    publishedAt: new Date('2024-03-01T00:00:00Z'),
    name: `release-${tagName}`,
    isPrerelease: false,
    description: '',
    target: 'master',
    isDraft: false,
    tagName,
    id: 1,
    ...overrides,
  }
}

export function comparison(
  base: string,
  head: string,
  status: ComparisonStatus,
): Comparison {
  return {
    url: `https://github.com/o/r/compare/${base}...${head}`,
    totalCommits: 0,
    behindBy: 0,
    aheadBy: 0,
    status,
    base,
    head,
  }
}

/**
 * Client where every lookup misses, creates echo their input and every
 * comparison is identical.
 */
export function createFakeClient(): Mocked<RepositoryClient> {
  return {
    createRelease: vi.fn<RepositoryClient['createRelease']>(input =>
      Promise.resolve(
        release(input.tagName, {
          isPrerelease: input.prerelease,
          target: input.targetSha,
          name: input.name,
        }),
      ),
    ),
    getRateLimitStatus: vi.fn<RepositoryClient['getRateLimitStatus']>(() => ({
      resetAt: new Date(0),
      remaining: 5000,
    })),
    compare: vi.fn<RepositoryClient['compare']>((base, head) =>
      Promise.resolve(comparison(base, head, 'identical')),
    ),
    createBranch: vi.fn<RepositoryClient['createBranch']>((name, sha) =>
      Promise.resolve(branch(name, sha)),
    ),
    listPrereleases: vi.fn<RepositoryClient['listPrereleases']>(() =>
      Promise.resolve([]),
    ),
    latestPrerelease: vi.fn<RepositoryClient['latestPrerelease']>(notFound),
    latestRelease: vi.fn<RepositoryClient['latestRelease']>(notFound),
    getRelease: vi.fn<RepositoryClient['getRelease']>(notFound),
    getBranch: vi.fn<RepositoryClient['getBranch']>(notFound),
  }
}

/**
 * Make `getBranch` find the given branches (name to SHA) and miss all others.
 */
export function withBranches(
  client: Mocked<RepositoryClient>,
  branches: Record<string, string>,
): void {
  client.getBranch.mockImplementation(name => {
    let sha = branches[name]
    return sha ? Promise.resolve(branch(name, sha)) : notFound()
  })
}

export function workflowContext(
  client: RepositoryClient,
): ReleaseWorkflowContext {
  return { logger: pino({ level: 'silent' }), client }
}
