import { createSpinner } from 'nanospinner'
import cac from 'cac'

import type { ReleaseWorkflow } from '../types/release-workflow'

import { createReleaseWorkflow } from '../core/workflow/create-release-workflow'
import { createRepositoryClient } from '../core/api/create-repository-client'
import { createLogger } from '../core/logging/create-logger'
import { ReleaseError } from '../core/errors/release-error'
import { printReleaseCreated } from './print-release-created'
import { printBranchCreated } from './print-branch-created'
import { normalizeLogLevel } from './normalize-log-level'
import { printMergeStatus } from './print-merge-status'
import { loadConfig } from '../core/config/load-config'
import { printFailure } from './print-failure'
import { version } from '../package.json'

/** CLI Options. */
interface CLIOptions {
  /** Extra config file. */
  config?: string

  /** Log level. */
  log?: string
}

/**
 * Build the workflow from config and run one command with a spinner.
 *
 * @param options - Global CLI options.
 * @param label - Spinner text.
 * @param task - Command body; returns the printer for its result.
 */
async function execute(
  options: CLIOptions,
  label: string,
  task: (workflow: ReleaseWorkflow) => Promise<() => void>,
): Promise<void> {
  let spinner = createSpinner(label).start()

  try {
    let logger = createLogger(normalizeLogLevel(options.log))
    let config = loadConfig({ path: options.config })
    let client = createRepositoryClient(config, logger)
    let print = await task(createReleaseWorkflow({ client, logger }))
    logger.debug(client.getRateLimitStatus(), 'Rate limit status')

    spinner.success('Done')
    print()
  } catch (error) {
    spinner.error('Failed')
    printFailure(error)
    process.exit(1)
  }
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('release-train')

  cli
    .help()
    .version(version)
    .option('--log <level>', 'Log level: trace, debug, info, warn, error', {
      default: 'error',
    })
    .option('--config <path>', 'Config file read after .releasetrainrc')

  cli
    .command(
      'start <kind> <name>',
      'Start a release (version) or hotfix (ticket) branch',
    )
    .example('release-train start release 17.11.02.00')
    .example('release-train start hotfix EB-1234')
    .action(async (kind: string, name: string, options: CLIOptions) => {
      await execute(options, `Starting ${kind} branch...`, async workflow => {
        if (kind === 'release') {
          let branch = await workflow.createReleaseBranch(name)
          return () => printBranchCreated(branch)
        }
        if (kind === 'hotfix') {
          let branch = await workflow.createHotfixBranch(name)
          return () => printBranchCreated(branch)
        }
        throw new ReleaseError(
          'invalid-format',
          `Unknown branch kind "${kind}". Expected "release" or "hotfix".`,
        )
      })
    })

  cli
    .command('qa <version>', 'Create a pre-release for QA')
    .action(async (releaseVersion: string, options: CLIOptions) => {
      await execute(
        options,
        `Creating pre-release ${releaseVersion}...`,
        async workflow => {
          let release = await workflow.createPreRelease(releaseVersion)
          return () => printReleaseCreated(release)
        },
      )
    })

  cli
    .command('release <version>', 'Create a release for production')
    .action(async (releaseVersion: string, options: CLIOptions) => {
      await execute(
        options,
        `Creating release ${releaseVersion}...`,
        async workflow => {
          let release = await workflow.createRelease(releaseVersion)
          return () => printReleaseCreated(release)
        },
      )
    })

  cli
    .command('check <version>', 'Check the merge status before releasing')
    .action(async (releaseVersion: string, options: CLIOptions) => {
      await execute(
        options,
        `Checking merge status for ${releaseVersion}...`,
        async workflow => {
          let status = await workflow.checkMergeStatus(releaseVersion)
          return () => printMergeStatus(status)
        },
      )
    })

  cli.on('command:*', () => {
    printFailure(new Error(`Unknown command: ${cli.args.join(' ')}`))
    process.exit(1)
  })

  cli.parse()

  if (
    !cli.matchedCommand &&
    cli.args.length === 0 &&
    !cli.options['help'] &&
    !cli.options['version']
  ) {
    cli.outputHelp()
  }
}
