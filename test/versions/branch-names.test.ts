import { describe, expect, it } from 'vitest'

import { releaseBranchName } from '../../core/versions/release-branch-name'
import { hotfixBranchName } from '../../core/versions/hotfix-branch-name'

describe('releaseBranchName', () => {
  it('prefixes the major version', () => {
    expect(releaseBranchName('17.11.01.02')).toBe('release-17.11.01.02')
  })
})

describe('hotfixBranchName', () => {
  it('prefixes the ticket', () => {
    expect(hotfixBranchName('EB-123-fix')).toBe('hotfix-EB-123-fix')
  })
})
