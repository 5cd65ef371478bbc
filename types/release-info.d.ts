/** Normalized release information used across the tool. */
export interface ReleaseInfo {
  /** Release description (body) or null when absent. */
  description: string | null

  /** Publication date, null for drafts. */
  publishedAt: Date | null

  /** True when the release is marked as prerelease. */
  isPrerelease: boolean

  /** True when the release is a draft. */
  isDraft: boolean

  /** Branch name or commit SHA the tag was created from. */
  target: string

  /** Tag name (e.g. 17.11.01.02). */
  tagName: string

  /** Release name or tag name when name is not provided. */
  name: string

  /** HTML URL of the release page. */
  url: string

  /** Numeric release id. */
  id: number
}
