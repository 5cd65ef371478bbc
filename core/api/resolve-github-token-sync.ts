import { execFileSync } from 'node:child_process'
import { readFileSync } from 'node:fs'
import { join } from 'node:path'

/**
 * Resolve a GitHub token when none is configured explicitly.
 *
 * Priority:
 *
 * 1. Env GITHUB_TOKEN
 * 2. Env GH_TOKEN
 * 3. Gh auth token
 * 4. `github.token` or `github.oauth-token` in the repository's .git/config.
 *
 * @param env - Environment to read.
 * @param cwd - Directory holding the `.git` folder.
 * @returns Token string or undefined when not found.
 */
export function resolveGitHubTokenSync(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): undefined | string {
  for (let name of ['GITHUB_TOKEN', 'GH_TOKEN']) {
    let value = env[name]?.trim()
    if (value) {
      return value
    }
  }

  try {
    let output = execFileSync('gh', ['auth', 'token'], {
      stdio: ['ignore', 'pipe', 'ignore'],
      encoding: 'utf8',
      timeout: 500,
    })
    let token = output.trim()
    if (token) {
      return token
    }
  } catch {
    /** Gh missing or logged out. */
  }

  let content: string
  try {
    content = readFileSync(join(cwd, '.git', 'config'), 'utf8')
  } catch {
    return undefined
  }

  let section: string | null = null
  for (let rawLine of content.split(/\r?\n/u)) {
    let line = rawLine.trim()
    let sectionMatch = line.match(/^\[(?<name>[^\]]+)\]$/u)
    if (sectionMatch) {
      section = sectionMatch.groups?.['name']?.toLowerCase() ?? null
      continue
    }

    if (section === 'github') {
      let tokenMatch = line.match(
        /^(?:oauth-token|token)\s*=\s*(?<value>\S[^\n\r]*)$/u,
      )
      let token = tokenMatch?.groups?.['value']?.trim()
      if (token) {
        return token
      }
    }
  }

  return undefined
}
