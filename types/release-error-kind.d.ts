/** Every way a release operation can fail. */
export type ReleaseErrorKind =
  | 'base-branch-unresolved'
  | 'no-production-release'
  | 'base-branch-missing'
  | 'already-exists'
  | 'invalid-config'
  | 'invalid-format'
  | 'merge-required'
  | 'not-found'
  | 'transport'
  | 'remote'
