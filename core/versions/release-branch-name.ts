/**
 * Name of the release branch for a major version.
 *
 * @param majorVersion - Major version, see `extractMajorVersion`.
 * @returns Branch name, e.g. `release-17.11.01.02`.
 */
export function releaseBranchName(majorVersion: string): string {
  return `release-${majorVersion}`
}
