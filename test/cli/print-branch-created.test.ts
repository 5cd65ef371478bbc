import type { MockInstance } from 'vitest'

import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'

import { printBranchCreated } from '../../cli/print-branch-created'

describe('printBranchCreated', () => {
  let consoleInfoSpy: MockInstance

  beforeEach(() => {
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleInfoSpy.mockRestore()
  })

  it('prints the branch, its URL and the checkout command', () => {
    printBranchCreated({
      url: 'https://api.github.com/repos/o/r/git/refs/heads/release-17.11.02.00',
      name: 'release-17.11.02.00',
      sha: 'abc1234',
    })

    expect(consoleInfoSpy).toHaveBeenCalledTimes(3)
    expect(consoleInfoSpy).toHaveBeenCalledWith(
      expect.stringContaining('Branch: release-17.11.02.00 created'),
    )
    expect(consoleInfoSpy).toHaveBeenCalledWith(
      expect.stringContaining(
        'https://api.github.com/repos/o/r/git/refs/heads/release-17.11.02.00',
      ),
    )
    expect(consoleInfoSpy).toHaveBeenCalledWith(
      '\n\tgit fetch --all && git checkout release-17.11.02.00\n',
    )
  })

  it('skips the URL line when there is none', () => {
    printBranchCreated({ name: 'hotfix-EB-1', sha: 'abc1234', url: '' })

    expect(consoleInfoSpy).toHaveBeenCalledTimes(2)
  })
})
