import pc from 'picocolors'

import { isRateLimitError } from '../core/api/is-rate-limit-error'
import { CONFIG_FILE_NAME } from '../core/config/load-config'

/**
 * Prints a failed command's error.
 *
 * @param error - Caught value.
 */
export function printFailure(error: unknown): void {
  if (isRateLimitError(error)) {
    console.error(pc.yellow('\n⚠️ Rate Limit Exceeded\n'))
    console.error(error.message)
    console.error(
      pc.gray(`\nCheck the TOKEN configured in ${CONFIG_FILE_NAME}\n`),
    )
    return
  }

  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )
}
