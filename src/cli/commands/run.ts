/**
 * `waymark run` command
 *
 * Executes a phase graph for one request and prints the run report.
 *
 * Usage:
 *   waymark run graph.yaml --request "Explain the auth flow" --domains auth
 *   waymark run graph.yaml --request "…" --db .waymark/runs.db --output-format json
 *
 * Exit codes:
 *   0  — run completed
 *   1  — run aborted, or unexpected system error
 *   2  — file not found, parse error, invalid configuration or graph violations
 */

import type { Command } from 'commander'
import { createEventBus } from '../../core/event-bus.js'
import { toError } from '../../core/errors.js'
import type { WaymarkConfig } from '../../modules/config/config-schema.js'
import type { ConfigSystemOptions } from '../../modules/config/config-system.js'
import { createPhaseOrchestratorFromConfig } from '../../modules/phase-orchestrator/phase-orchestrator-impl.js'
import { createTokenTracker } from '../../modules/token-tracker/token-tracker.js'
import { createHttpValidator } from '../../modules/validation-gate/http-validator.js'
import type { ExternalValidator } from '../../modules/validation-gate/validation-gate.js'
import { openDatabase, type DatabaseWrapper } from '../../persistence/database.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import { formatRunReport } from '../formatters/report-formatter.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  createCommandRegistry,
  loadConfigForCommand,
  loadGraphForCommand,
  parseOutputFormat,
  writeError,
  type OutputFormat,
} from '../utils/command-context.js'
import { buildJsonOutput, parseList } from '../utils/formatting.js'

const logger = createLogger('cli:run')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_COMPLETED = EXIT_SUCCESS
export const RUN_EXIT_ABORTED = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunActionOptions {
  filePath: string
  request: string
  domains: string[]
  /** Run store database; omitted means nothing is persisted */
  dbPath?: string
  /** Overrides validation.endpoint from configuration */
  validatorUrl?: string
  outputFormat: OutputFormat
  configOptions?: ConfigSystemOptions
  signal?: AbortSignal
}

function withValidatorUrl(options: ConfigSystemOptions, validatorUrl: string | undefined): ConfigSystemOptions {
  if (validatorUrl === undefined) return options
  const overrides = options.cliOverrides ?? {}
  return {
    ...options,
    cliOverrides: { ...overrides, validation: { ...overrides.validation, endpoint: validatorUrl } },
  }
}

function createValidator(config: WaymarkConfig): ExternalValidator {
  const { endpoint, token } = config.validation
  return createHttpValidator({
    ...(endpoint !== undefined ? { endpoint } : {}),
    ...(token !== undefined ? { token } : {}),
  })
}

// ---------------------------------------------------------------------------
// runRunAction — testable core logic
// ---------------------------------------------------------------------------

export async function runRunAction(options: RunActionOptions): Promise<number> {
  const config = await loadConfigForCommand(withValidatorUrl(options.configOptions ?? {}, options.validatorUrl))
  if (!config.ok) return config.exitCode

  const loaded = loadGraphForCommand(options.filePath, {
    registry: createCommandRegistry(config.value),
    validator: createValidator(config.value),
  })
  if (!loaded.ok) return loaded.exitCode
  const { name, graph, arbiter, arbiterTimeoutMs } = loaded.value

  let store: DatabaseWrapper | undefined
  if (options.dbPath !== undefined) {
    try {
      store = openDatabase(options.dbPath)
    } catch (err) {
      writeError(`Cannot open run store at ${options.dbPath}: ${toError(err).message}`)
      return EXIT_ERROR
    }
  }

  const eventBus = createEventBus()
  const tracker = createTokenTracker(eventBus, config.value.tokens)
  await tracker.initialize()

  try {
    const orchestrator = createPhaseOrchestratorFromConfig(config.value, {
      eventBus,
      graphName: name,
      ...(store !== undefined ? { db: store.db } : {}),
      ...(arbiter !== undefined ? { arbiter } : {}),
      ...(arbiterTimeoutMs !== undefined ? { arbiterTimeoutMs } : {}),
    })
    const report = await orchestrator.run(graph, {
      request: options.request,
      domains: options.domains,
      ...(options.signal !== undefined ? { signal: options.signal } : {}),
    })
    const tokens = tracker.getReport()

    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(buildJsonOutput('run', { report, tokens }), null, 2) + '\n')
    } else {
      process.stdout.write(formatRunReport(report, tokens) + '\n')
    }
    return report.status === 'completed' ? RUN_EXIT_COMPLETED : RUN_EXIT_ABORTED
  } catch (err) {
    logger.error({ err }, 'Run failed')
    writeError(maskSecrets(toError(err).message))
    return EXIT_ERROR
  } finally {
    await tracker.shutdown()
    store?.close()
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command): void {
  program
    .command('run <file>')
    .description('Execute a phase graph for one request')
    .requiredOption('--request <text>', 'Request text handed to every task')
    .option('--domains <list>', 'Comma-separated domain tags detected for the request')
    .option('--db <path>', 'SQLite run store to save the report to')
    .option('--validator-url <url>', 'Base URL of the external validator')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        file: string,
        opts: { request: string; domains?: string; db?: string; validatorUrl?: string; outputFormat: string },
      ) => {
        const controller = new AbortController()
        const onInterrupt = (): void => {
          controller.abort(new Error('interrupted'))
        }
        process.once('SIGINT', onInterrupt)
        try {
          process.exitCode = await runRunAction({
            filePath: file,
            request: opts.request,
            domains: parseList(opts.domains),
            ...(opts.db !== undefined ? { dbPath: opts.db } : {}),
            ...(opts.validatorUrl !== undefined ? { validatorUrl: opts.validatorUrl } : {}),
            outputFormat: parseOutputFormat(opts.outputFormat),
            signal: controller.signal,
          })
        } finally {
          process.off('SIGINT', onInterrupt)
        }
      },
    )
}
