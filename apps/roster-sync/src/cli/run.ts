/**
 * roster-sync command
 *
 * Builds the cycle from settings and flags, runs it once and maps the
 * outcome to an exit code. Collaborators can be injected for tests.
 */

import type { ILogger } from '@codeplug/logger'
import { loggers } from '../config/logger.js'
import { loadSettings, type Settings } from '../config/settings.js'
import { ConfigFault, EXIT_CODES, FAULT_CODES, classifyFault } from '../errors.js'
import { RadioIdClient } from '../lookup/radioid-client.js'
import { runCycle, type CycleSummary } from '../pipeline/run-cycle.js'
import { Enricher } from '../roster/enrich.js'
import { CsvRosterStore, type RosterStore } from '../roster/store.js'
import { HttpFetcher } from '../source/fetch/http-fetcher.js'
import type { Fetcher } from '../source/fetch/types.js'
import { createTableSource } from '../source/registry.js'
import type { IdentityLookup } from '../types.js'
import { asString, parseFlags } from './parse-flags.js'

const SWITCHES = new Set(['dry-run', 'help'])
const VALUE_FLAGS = new Set(['source', 'url', 'max-rows', 'user', 'password', 'data-dir'])
const RULE = '='.repeat(60)

export interface CliDependencies {
  env?: Record<string, string | undefined>
  fetcher?: Fetcher
  lookup?: IdentityLookup
  store?: (settings: Settings) => RosterStore
  logger?: ILogger
  out?: (line: string) => void
  err?: (line: string) => void
}

export const USAGE = [
  'Usage: roster-sync [options]',
  '',
  'Reads the monitoring directory, looks up unknown radio ids and merges them',
  'into code_plug.csv, add_users.csv and mwg_users.csv.',
  '',
  'Options:',
  '  --source callwatch|backend   Directory to read (default: callwatch)',
  '  --url <url>                  Override the directory URL for the chosen source',
  '  --max-rows <n>               CallWatch rows to read (default: 200)',
  '  --user <name>                Backend username',
  '  --password <password>        Backend password',
  '  --data-dir <dir>             Directory holding the roster CSV files',
  '  --dry-run                    Run every stage but do not write the rosters',
  '  --help                       Show this message',
]

function checkFlags(flags: Record<string, string | boolean>, positionals: string[]): void {
  if (positionals.length > 0) {
    throw new ConfigFault(FAULT_CODES.INVALID_CONFIG, `Unexpected argument: ${positionals[0]}`)
  }
  for (const [name, value] of Object.entries(flags)) {
    if (SWITCHES.has(name)) continue
    if (!VALUE_FLAGS.has(name)) {
      throw new ConfigFault(FAULT_CODES.INVALID_CONFIG, `Unknown option: --${name}`)
    }
    if (typeof value !== 'string') {
      throw new ConfigFault(FAULT_CODES.INVALID_CONFIG, `Option --${name} needs a value`)
    }
  }
}

export function formatSummary(summary: CycleSummary): string[] {
  return [
    RULE,
    `${summary.rowsExamined} Radio IDs examined.`,
    `SUCCESS: ${summary.newRecords} New Users discovered.`,
    RULE,
  ]
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line))
  const err = deps.err ?? ((line: string) => console.error(line))
  const logger = deps.logger ?? loggers.cli

  try {
    const { flags, positionals } = parseFlags(argv, SWITCHES)
    if (flags.help === true) {
      USAGE.forEach((line) => out(line))
      return EXIT_CODES.SUCCESS
    }
    checkFlags(flags, positionals)

    const settings = loadSettings(deps.env ?? process.env, {
      source: asString(flags.source),
      url: asString(flags.url),
      maxRows: asString(flags['max-rows']),
      user: asString(flags.user),
      password: asString(flags.password),
      dataDir: asString(flags['data-dir']),
      dryRun: flags['dry-run'] === true,
    })

    const fetcher = deps.fetcher ?? new HttpFetcher({ timeoutMs: settings.source.fetchTimeoutMs })
    const { source, criteria } = createTableSource(settings, { fetcher })
    const lookup =
      deps.lookup ??
      new RadioIdClient({ baseUrl: settings.lookup.baseUrl, timeoutMs: settings.lookup.timeoutMs, fetcher })
    const store = deps.store ? deps.store(settings) : new CsvRosterStore(settings.store)

    logger.info('Starting sync cycle', {
      source: settings.source.mode,
      mainRoster: settings.store.mainPath,
      dryRun: settings.dryRun,
    })

    const summary = await runCycle({
      source,
      criteria,
      store,
      enricher: new Enricher(lookup),
      dryRun: settings.dryRun,
    })

    formatSummary(summary).forEach((line) => out(line))
    return EXIT_CODES.SUCCESS
  } catch (error) {
    const fault = classifyFault(error)
    logger.error(
      'Sync cycle failed',
      { kind: fault.kind, code: fault.code, details: fault.details },
      fault.isOperational ? undefined : error
    )
    err(`ERROR: ${fault.message}`)
    if (fault.exitCode === EXIT_CODES.USAGE) {
      err('Run with --help for usage.')
    }
    return fault.exitCode
  }
}
