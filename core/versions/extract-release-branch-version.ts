/**
 * Version of the first release cut from a release branch: the major version
 * with its last component reset to `01`.
 *
 * @param version - Version string.
 * @returns Branch version, e.g. `17.11.02.01` for `17.11.02.05.3`.
 */
export function extractReleaseBranchVersion(version: string): string {
  let parts = version.split('.').slice(0, 4)
  parts[parts.length - 1] = '01'
  return parts.join('.')
}
