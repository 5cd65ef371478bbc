import type { Logger } from 'pino'

import type { RepositoryClient } from './repository-client'

/** Dependencies of the release workflow operations. */
export interface ReleaseWorkflowContext {
  /** Repository the releases are cut in. */
  client: RepositoryClient

  /** Diagnostic logger. */
  logger: Logger
}
