/** Production branch. */
export const MAINLINE_BRANCH = 'master'

/** Integration branch release branches are started from. */
export const DEVELOP_BRANCH = 'develop'
