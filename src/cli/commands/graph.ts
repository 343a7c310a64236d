/**
 * `waymark graph` command group
 *
 * Usage:
 *   waymark graph validate graph.yaml                        Check a graph file
 *   waymark graph plan graph.yaml --domains auth --request "…" Show the steps a run would take
 *
 * Exit codes:
 *   0  — success
 *   1  — unexpected system error
 *   2  — file not found, parse error, invalid configuration or graph violations
 */

import type { Command } from 'commander'
import type { ConfigSystemOptions } from '../../modules/config/config-system.js'
import { planGraph } from '../../modules/phase-graph/execution-plan.js'
import type { LoadedGraph } from '../../modules/phase-graph/graph-loader.js'
import { estimatePlanTokens } from '../../modules/token-tracker/token-estimator.js'
import { formatGraphPlan } from '../formatters/report-formatter.js'
import {
  EXIT_SUCCESS,
  createCommandRegistry,
  loadConfigForCommand,
  loadGraphForCommand,
  parseOutputFormat,
  type OutputFormat,
} from '../utils/command-context.js'
import { buildJsonOutput, parseList } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GraphValidateOptions {
  filePath: string
  outputFormat: OutputFormat
  configOptions?: ConfigSystemOptions
}

export interface GraphPlanOptions {
  filePath: string
  /** Request text the token estimate is based on */
  request: string
  domains: string[]
  outputFormat: OutputFormat
  configOptions?: ConfigSystemOptions
}

export interface GraphSummary {
  name: string
  phases: number
  tasks: number
  groups: number
}

export function summarizeGraph(loaded: LoadedGraph): GraphSummary {
  const { phases } = loaded.graph
  return {
    name: loaded.name,
    phases: phases.length,
    tasks: phases.reduce((n, p) => n + p.tasks.length, 0),
    groups: phases.reduce((n, p) => n + p.groups.length, 0),
  }
}

// ---------------------------------------------------------------------------
// Actions — testable core logic
// ---------------------------------------------------------------------------

export async function runGraphValidateAction(options: GraphValidateOptions): Promise<number> {
  const config = await loadConfigForCommand(options.configOptions)
  if (!config.ok) return config.exitCode

  const loaded = loadGraphForCommand(options.filePath, { registry: createCommandRegistry(config.value) })
  if (!loaded.ok) return loaded.exitCode

  const summary = summarizeGraph(loaded.value)
  if (options.outputFormat === 'json') {
    process.stdout.write(JSON.stringify(buildJsonOutput('graph validate', { valid: true, ...summary }), null, 2) + '\n')
  } else {
    process.stdout.write(
      `Graph "${summary.name}" is valid: ${String(summary.phases)} phase(s), ${String(summary.tasks)} task(s), ${String(summary.groups)} parallel group(s)\n`,
    )
  }
  return EXIT_SUCCESS
}

export async function runGraphPlanAction(options: GraphPlanOptions): Promise<number> {
  const config = await loadConfigForCommand(options.configOptions)
  if (!config.ok) return config.exitCode

  const loaded = loadGraphForCommand(options.filePath, { registry: createCommandRegistry(config.value) })
  if (!loaded.ok) return loaded.exitCode

  const domains = [...new Set(options.domains)].sort()
  const plan = planGraph(loaded.value.graph, new Set(domains))
  const estimate = estimatePlanTokens(plan, options.request, config.value.tokens)

  if (options.outputFormat === 'json') {
    const data = { graph: loaded.value.name, domains, phases: plan, tokens: estimate }
    process.stdout.write(JSON.stringify(buildJsonOutput('graph plan', data), null, 2) + '\n')
  } else {
    process.stdout.write(formatGraphPlan(loaded.value.name, plan, estimate) + '\n')
  }
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerGraphCommand
// ---------------------------------------------------------------------------

export function registerGraphCommand(program: Command): void {
  const graph = program.command('graph').description('Inspect phase graph definition files')

  graph
    .command('validate <file>')
    .description('Validate a YAML/JSON phase graph and report every violation')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (file: string, opts: { outputFormat: string }) => {
      process.exitCode = await runGraphValidateAction({
        filePath: file,
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })

  graph
    .command('plan <file>')
    .description('Show the ordered steps, activated tasks and token estimates for a run')
    .option('--domains <list>', 'Comma-separated domain tags')
    .option('--request <text>', 'Request text used for token estimates', '')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (file: string, opts: { domains?: string; request: string; outputFormat: string }) => {
      process.exitCode = await runGraphPlanAction({
        filePath: file,
        request: opts.request,
        domains: parseList(opts.domains),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
