export type { ReleaseWorkflowContext } from '../types/release-workflow-context'
export type { RepositoryClient } from '../types/repository-client'
export type { RepositoryConfig } from '../types/repository-config'
export type { ReleaseErrorKind } from '../types/release-error-kind'
export type { ReleaseWorkflow } from '../types/release-workflow'
export type { Comparison, ComparisonStatus } from '../types/comparison'
export type { MergeStatus } from '../types/merge-status'
export type { ReleaseInfo } from '../types/release-info'
export type { NewRelease } from '../types/new-release'
export type { BranchRef } from '../types/branch-ref'
export type { LogLevel } from '../types/log-level'

export { extractReleaseBranchVersion } from './versions/extract-release-branch-version'
export { extractYearWeekVersion } from './versions/extract-year-week-version'
export { createReleaseWorkflow } from './workflow/create-release-workflow'
export { createRepositoryClient } from './api/create-repository-client'
export { extractMajorVersion } from './versions/extract-major-version'
export { validateTicketName } from './versions/validate-ticket-name'
export { releaseBranchName } from './versions/release-branch-name'
export { hotfixBranchName } from './versions/hotfix-branch-name'
export { ReleaseError, isReleaseError } from './errors/release-error'
export { validateVersion } from './versions/validate-version'
export { isRateLimitError } from './api/is-rate-limit-error'
export { createLogger } from './logging/create-logger'
export { loadConfig } from './config/load-config'
