/** Credentials and coordinates of the repository releases are cut in. */
export interface RepositoryConfig {
  /** GitHub REST API root, without trailing slash. */
  apiRoot: string

  /** Personal access token. */
  token: string

  /** Repository owner (user or organization). */
  owner: string

  /** Login used for basic auth. */
  user: string

  /** Repository name. */
  repo: string
}
