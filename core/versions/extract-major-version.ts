/**
 * Extract the major version, the first four dot-separated components.
 *
 * Performs no validation: shorter versions come back with the components they
 * have.
 *
 * @param version - Version string.
 * @returns Major version used to group releases under one branch.
 */
export function extractMajorVersion(version: string): string {
  return version.split('.').slice(0, 4).join('.')
}
