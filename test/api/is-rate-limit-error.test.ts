import { describe, expect, it } from 'vitest'

import { isRateLimitError } from '../../core/api/is-rate-limit-error'
import { ReleaseError } from '../../core/errors/release-error'

describe('isRateLimitError', () => {
  it('detects a 403 mentioning the rate limit', () => {
    let error = new ReleaseError('remote', 'limited', {
      body: 'API rate limit exceeded',
      status: 403,
    })
    expect(isRateLimitError(error)).toBeTruthy()
  })

  it('ignores other 403s and other kinds', () => {
    expect(
      isRateLimitError(
        new ReleaseError('remote', 'denied', { body: 'Forbidden', status: 403 }),
      ),
    ).toBeFalsy()
    expect(
      isRateLimitError(
        new ReleaseError('not-found', 'x', { body: 'rate limit', status: 404 }),
      ),
    ).toBeFalsy()
    expect(isRateLimitError(new Error('rate limit'))).toBeFalsy()
  })
})
