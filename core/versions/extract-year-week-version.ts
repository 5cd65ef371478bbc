/**
 * Extract the `year.week` pair of a version.
 *
 * Versions with a leading zero carry it in components three and four
 * (`0.0.17.11`), all others in the first two (`17.11.01.02`).
 *
 * @param version - Version string.
 * @returns Year and week joined by a dot.
 */
export function extractYearWeekVersion(version: string): string {
  let parts = version.split('.')

  if (version.startsWith('0')) {
    return parts.slice(2, 4).join('.')
  }

  return parts.slice(0, 2).join('.')
}
