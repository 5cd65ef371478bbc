/** Parameters for creating a release. */
export interface NewRelease {
  /** Create the release as a prerelease. */
  prerelease: boolean

  /** Commit SHA the tag is created at. */
  targetSha: string

  /** Tag name, equal to the version. */
  tagName: string

  /** Display name. */
  name: string
}
