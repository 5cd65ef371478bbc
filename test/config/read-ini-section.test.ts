import { describe, expect, it } from 'vitest'

import { readIniSection } from '../../core/config/read-ini-section'

describe('readIniSection', () => {
  it('reads options of the requested section only', () => {
    let content = [
      '[bugtracker]',
      'URL = https://tracker.example.com',
      '',
      '[repo]',
      'OWNER=acme',
      'repo: widgets',
      '  token =  test-token  ',
    ].join('\n')

    expect(readIniSection(content, 'repo')).toEqual({
      TOKEN: 'test-token',
      OWNER: 'acme',
      REPO: 'widgets',
    })
  })

  it('skips comments and handles CRLF line endings', () => {
    let content = '[repo]\r\n# OWNER=ignored\r\n; REPO=ignored\r\nUSER=dev\r\n'
    expect(readIniSection(content, 'repo')).toEqual({ USER: 'dev' })
  })

  it('returns an empty object when the section is absent', () => {
    expect(readIniSection('[other]\nUSER=dev\n', 'repo')).toEqual({})
  })

  it('keeps values that contain separators', () => {
    expect(
      readIniSection('[repo]\nAPI_ROOT=https://ghe.example.com/api/v3', 'repo'),
    ).toEqual({ API_ROOT: 'https://ghe.example.com/api/v3' })
  })
})
