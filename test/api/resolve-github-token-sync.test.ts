import { beforeEach, describe, expect, it, vi } from 'vitest'
import { execFileSync } from 'node:child_process'
import { readFileSync } from 'node:fs'

import { resolveGitHubTokenSync } from '../../core/api/resolve-github-token-sync'

vi.mock(import('node:child_process'), () => ({
  execFileSync: vi.fn(),
}))

vi.mock(import('node:fs'), () => ({
  readFileSync: vi.fn(),
}))

describe('resolveGitHubTokenSync', () => {
  beforeEach(() => {
    vi.resetAllMocks()
    vi.mocked(execFileSync).mockImplementation(() => {
      throw new Error('gh not installed')
    })
    vi.mocked(readFileSync).mockImplementation(() => {
      throw new Error('no git config')
    })
  })

  it('returns GITHUB_TOKEN from env', () => {
    expect(resolveGitHubTokenSync({ GITHUB_TOKEN: ' env-token ' }, '/w')).toBe(
      'env-token',
    )
    expect(execFileSync).not.toHaveBeenCalled()
  })

  it('falls back to GH_TOKEN from env', () => {
    expect(resolveGitHubTokenSync({ GH_TOKEN: 'gh-token' }, '/w')).toBe(
      'gh-token',
    )
  })

  it('reads token from gh CLI', () => {
    vi.mocked(execFileSync).mockReturnValue('cli-token\n')
    expect(resolveGitHubTokenSync({}, '/w')).toBe('cli-token')
  })

  it('reads token from the github section of .git/config', () => {
    vi.mocked(readFileSync).mockReturnValue(
      '[core]\n\tbare = false\n[github]\n\ttoken = cfg-token\n',
    )
    expect(resolveGitHubTokenSync({}, '/w')).toBe('cfg-token')
    expect(readFileSync).toHaveBeenCalledWith('/w/.git/config', 'utf8')
  })

  it('ignores token keys outside the github section', () => {
    vi.mocked(readFileSync).mockReturnValue('[hub]\n\ttoken = other\n')
    expect(resolveGitHubTokenSync({}, '/w')).toBeUndefined()
  })

  it('returns undefined when nothing is found', () => {
    expect(resolveGitHubTokenSync({}, '/w')).toBeUndefined()
  })
})
