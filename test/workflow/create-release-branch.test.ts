import { describe, expect, it } from 'vitest'

import { createReleaseBranch } from '../../core/workflow/create-release-branch'
import { ReleaseError } from '../../core/errors/release-error'
import {
  workflowContext,
  createFakeClient,
  withBranches,
  branch,
} from './fake-client'

describe('createReleaseBranch', () => {
  it('starts release-<major> at the tip of develop', async () => {
    let client = createFakeClient()
    withBranches(client, { develop: 'dev1234' })

    let result = await createReleaseBranch(
      workflowContext(client),
      '17.11.01.02.05',
    )

    expect(client.createBranch).toHaveBeenCalledWith(
      'release-17.11.01.02',
      'dev1234',
    )
    expect(result).toEqual(branch('release-17.11.01.02', 'dev1234'))
  })

  it('refuses a branch that was already started', async () => {
    let client = createFakeClient()
    withBranches(client, { 'release-17.11.01.02': 'rel1234', develop: 'dev1234' })

    await expect(
      createReleaseBranch(workflowContext(client), '17.11.01.02'),
    ).rejects.toMatchObject({
      message:
        'Branch already started. Run\n' +
        '\tgit fetch --all && git checkout release-17.11.01.02',
      kind: 'already-exists',
    })
    expect(client.createBranch).not.toHaveBeenCalled()
  })

  it('fails when develop is missing', async () => {
    let client = createFakeClient()

    await expect(
      createReleaseBranch(workflowContext(client), '17.11.01.02'),
    ).rejects.toMatchObject({
      message: 'Base branch develop does not exist',
      kind: 'base-branch-missing',
    })
    expect(client.createBranch).not.toHaveBeenCalled()
  })

  it('validates the version before touching the repository', async () => {
    let client = createFakeClient()

    await expect(
      createReleaseBranch(workflowContext(client), '1.2'),
    ).rejects.toHaveProperty('kind', 'invalid-format')
    expect(client.getBranch).not.toHaveBeenCalled()
  })

  it('propagates lookup failures other than not-found', async () => {
    let client = createFakeClient()
    client.getBranch.mockRejectedValue(
      new ReleaseError('remote', 'GitHub API error: 500', { status: 500 }),
    )

    await expect(
      createReleaseBranch(workflowContext(client), '17.11.01.02'),
    ).rejects.toHaveProperty('kind', 'remote')
    expect(client.createBranch).not.toHaveBeenCalled()
  })
})
