/* eslint-disable camelcase */

import { beforeEach, describe, expect, it, vi } from 'vitest'
import { pino } from 'pino'

import { createRepositoryClient } from '../../core/api/create-repository-client'

describe('createRepositoryClient', () => {
  beforeEach(() => vi.restoreAllMocks())

  let config = {
    apiRoot: 'https://ghe.example.com/api/v3/',
    user: 'dev@example.com',
    token: 'test-token',
    owner: 'acme',
    repo: 'widgets',
  }

  it('authenticates with basic auth against the repository URL', async () => {
    let spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          object: { type: 'commit', sha: 'abc1234' },
          url: 'https://ghe.example.com/api/v3/repos/acme/widgets/git/refs/heads/develop',
          ref: 'refs/heads/develop',
        }),
        { status: 200 },
      ),
    )

    let client = createRepositoryClient(config, pino({ level: 'silent' }))
    let branch = await client.getBranch('develop')

    let [url, init] = spy.mock.calls[0] ?? []
    expect(url).toBe(
      'https://ghe.example.com/api/v3/repos/acme/widgets/git/refs/heads/develop',
    )
    expect(init?.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from('dev@example.com:test-token').toString('base64')}`,
    })
    expect(branch.sha).toBe('abc1234')
  })

  it('exposes the rate limit snapshot', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{"message":"Not Found"}', {
        headers: {
          'x-ratelimit-reset': '1700000000',
          'x-ratelimit-remaining': '17',
        },
        status: 404,
      }),
    )

    let client = createRepositoryClient(config)
    expect(client.getRateLimitStatus().remaining).toBe(5000)

    await expect(client.latestRelease()).rejects.toHaveProperty(
      'kind',
      'not-found',
    )
    expect(client.getRateLimitStatus()).toEqual({
      resetAt: new Date(1700000000 * 1000),
      remaining: 17,
    })
  })

  it('binds comparisons to the repository', async () => {
    let spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          html_url: 'u',
          status: 'identical',
          total_commits: 0,
          behind_by: 0,
          ahead_by: 0,
        }),
        { status: 200 },
      ),
    )

    let client = createRepositoryClient(config)
    let comparison = await client.compare('17.11.01.00', 'master')

    expect(spy.mock.calls[0]?.[0]).toBe(
      'https://ghe.example.com/api/v3/repos/acme/widgets/compare/17.11.01.00...master',
    )
    expect(comparison.status).toBe('identical')
  })
})

/* eslint-enable camelcase */
