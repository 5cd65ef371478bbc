import type { RepositoryClientContext } from '../../types/repository-client-context'

import { updateRateLimitInfo } from './update-rate-limit-info'
import { ReleaseError } from '../errors/release-error'

/**
 * Perform an HTTP request against the repository API with auth and rate-limit
 * updates.
 *
 * Failures are mapped to ReleaseError kinds: a rejected fetch becomes
 * `transport`, as does a body stream that breaks off. 404 becomes `not-found`,
 * every other non-2xx status becomes `remote` with the status and response
 * body attached, and so does a successful response whose body is not JSON.
 *
 * @param context - Client context with auth and rate-limit state.
 * @param path - Path relative to the repository base URL (`releases/latest`).
 * @param options - Request init options.
 * @returns Response headers and parsed data.
 */
export async function makeRequest(
  context: RepositoryClientContext,
  path: string,
  options: RequestInit = {},
): Promise<{ headers: Record<string, string>; data: unknown }> {
  let method = options.method ?? 'GET'
  let url = `${context.baseUrl}${path}`
  let headers: Record<string, string> = {
    Accept: 'application/vnd.github.v3+json',
    Authorization: context.authorization,
    'User-Agent': 'release-train',
  }

  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json'
  }

  context.logger.debug({ method, url }, 'GitHub API request')

  let response: Response
  try {
    response = await fetch(url, { ...options, headers })
  } catch (error) {
    let reason = error instanceof Error ? error.message : String(error)
    throw new ReleaseError(
      'transport',
      `Could not reach GitHub API (${method} ${url}): ${reason}`,
      { cause: error },
    )
  }

  let responseHeaders: Record<string, string> = {}
  for (let [key, value] of response.headers.entries()) {
    responseHeaders[key] = value
  }

  updateRateLimitInfo(context, responseHeaders)

  context.logger.debug(
    { status: response.status, method, url },
    'GitHub API response',
  )

  let body: string
  try {
    body = await response.text()
  } catch (error) {
    let reason = error instanceof Error ? error.message : String(error)
    throw new ReleaseError(
      'transport',
      `Could not read GitHub API response (${method} ${url}): ${reason}`,
      { status: response.status, cause: error },
    )
  }

  if (!response.ok) {
    let details = { status: response.status, body }

    if (response.status === 404) {
      throw new ReleaseError('not-found', `Not found: ${method} ${path}`, details)
    }

    context.logger.error({ ...details, method, url }, 'GitHub API error')

    if (response.status === 403 && /rate limit/iu.test(body)) {
      let resetTime = context.rateLimitReset.toLocaleTimeString()
      throw new ReleaseError(
        'remote',
        `GitHub API rate limit exceeded. Resets at ${resetTime}`,
        details,
      )
    }

    throw new ReleaseError(
      'remote',
      `GitHub API error: ${response.status} ${response.statusText}`,
      details,
    )
  }

  let data: unknown
  try {
    data = JSON.parse(body)
  } catch (error) {
    throw new ReleaseError(
      'remote',
      `GitHub API returned a malformed response (${method} ${url})`,
      { status: response.status, cause: error, body },
    )
  }

  return { headers: responseHeaders, data }
}
