/**
 * Runtime settings
 *
 * Read from environment variables, overridden by CLI flags, validated with zod.
 * Invalid settings throw a ZodError, which classifies as a config fault.
 */

import { resolve } from 'node:path'
import { z } from 'zod'
import type { ClassificationCriteria, SourceMode } from '../types.js'

export const DEFAULT_CALLWATCH_URL = 'http://184.191.128.77:42420/CallWatch'
export const DEFAULT_BACKEND_URL = 'http://184.191.128.77:42420'
export const DEFAULT_CALLS_PATH = '/Calls?network=AZ-TRBONET&page={page}&pagesize={size}'
export const DEFAULT_LOOKUP_BASE_URL = 'https://database.radioid.net/api/dmr/user/'

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional()

const envSchema = z.object({
  SOURCE_MODE: z.enum(['callwatch', 'backend']).default('callwatch'),
  CALLWATCH_URL: z.string().url().default(DEFAULT_CALLWATCH_URL),
  CALLWATCH_MAX_ROWS: z.coerce.number().int().positive().default(200),
  BACKEND_URL: z.string().url().default(DEFAULT_BACKEND_URL),
  BACKEND_CALLS_PATH: z
    .string()
    .refine((value) => value.includes('{page}'), 'must contain a {page} placeholder')
    .default(DEFAULT_CALLS_PATH),
  BACKEND_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  BACKEND_USER: optionalText,
  BACKEND_PASSWORD: optionalText,
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  DATA_DIR: z.string().min(1).default('.'),
  CODE_PLUG_FILE: z.string().min(1).default('code_plug.csv'),
  ADD_USERS_FILE: z.string().min(1).default('add_users.csv'),
  GROUP_USERS_FILE: z.string().min(1).default('mwg_users.csv'),
  GROUP_NAME_TOKEN: z.string().min(1).default('MWave'),
  GROUP_ID_TOKEN: z.string().min(1).default('310564'),
  NETWORK_TOKEN: z.string().min(1).default('AZ-TRBONET'),
  LOOKUP_BASE_URL: z.string().url().default(DEFAULT_LOOKUP_BASE_URL),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
})

export interface SourceSettings {
  mode: SourceMode
  callwatchUrl: string
  maxRows: number
  backendUrl: string
  callsPath: string
  pageSize: number
  user?: string
  password?: string
  fetchTimeoutMs: number
}

export interface StoreSettings {
  mainPath: string
  auditPath: string
  groupPath: string
}

export interface Settings {
  source: SourceSettings
  store: StoreSettings
  tokens: {
    groupName: string
    groupId: string
    network: string
  }
  lookup: {
    baseUrl: string
    timeoutMs: number
  }
  dryRun: boolean
}

/**
 * Values taken from CLI flags. `url` applies to the selected source mode.
 */
export interface SettingsOverrides {
  source?: string
  url?: string
  maxRows?: string
  user?: string
  password?: string
  dataDir?: string
  dryRun?: boolean
}

function pick(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value !== '')
}

export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  overrides: SettingsOverrides = {}
): Settings {
  const mode = pick(overrides.source, env.SOURCE_MODE)

  const parsed = envSchema.parse({
    SOURCE_MODE: mode,
    CALLWATCH_URL: pick(mode !== 'backend' ? overrides.url : undefined, env.CALLWATCH_URL),
    CALLWATCH_MAX_ROWS: pick(overrides.maxRows, env.CALLWATCH_MAX_ROWS),
    BACKEND_URL: pick(mode === 'backend' ? overrides.url : undefined, env.BACKEND_URL),
    BACKEND_CALLS_PATH: pick(env.BACKEND_CALLS_PATH),
    BACKEND_PAGE_SIZE: pick(env.BACKEND_PAGE_SIZE),
    BACKEND_USER: pick(overrides.user, env.BACKEND_USER),
    BACKEND_PASSWORD: pick(overrides.password, env.BACKEND_PASSWORD),
    FETCH_TIMEOUT_MS: pick(env.FETCH_TIMEOUT_MS),
    DATA_DIR: pick(overrides.dataDir, env.DATA_DIR),
    CODE_PLUG_FILE: pick(env.CODE_PLUG_FILE),
    ADD_USERS_FILE: pick(env.ADD_USERS_FILE),
    GROUP_USERS_FILE: pick(env.GROUP_USERS_FILE),
    GROUP_NAME_TOKEN: pick(env.GROUP_NAME_TOKEN),
    GROUP_ID_TOKEN: pick(env.GROUP_ID_TOKEN),
    NETWORK_TOKEN: pick(env.NETWORK_TOKEN),
    LOOKUP_BASE_URL: pick(env.LOOKUP_BASE_URL),
    LOOKUP_TIMEOUT_MS: pick(env.LOOKUP_TIMEOUT_MS),
  })

  const dataDir = resolve(parsed.DATA_DIR)

  return {
    source: {
      mode: parsed.SOURCE_MODE,
      callwatchUrl: parsed.CALLWATCH_URL,
      maxRows: parsed.CALLWATCH_MAX_ROWS,
      backendUrl: parsed.BACKEND_URL,
      callsPath: parsed.BACKEND_CALLS_PATH,
      pageSize: parsed.BACKEND_PAGE_SIZE,
      user: parsed.BACKEND_USER,
      password: parsed.BACKEND_PASSWORD,
      fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    },
    store: {
      mainPath: resolve(dataDir, parsed.CODE_PLUG_FILE),
      auditPath: resolve(dataDir, parsed.ADD_USERS_FILE),
      groupPath: resolve(dataDir, parsed.GROUP_USERS_FILE),
    },
    tokens: {
      groupName: parsed.GROUP_NAME_TOKEN,
      groupId: parsed.GROUP_ID_TOKEN,
      network: parsed.NETWORK_TOKEN,
    },
    lookup: {
      baseUrl: parsed.LOOKUP_BASE_URL,
      timeoutMs: parsed.LOOKUP_TIMEOUT_MS,
    },
    dryRun: overrides.dryRun === true,
  }
}

/**
 * The public monitor labels groups by name, the backend by numeric id.
 */
export function criteriaFor(settings: Settings): ClassificationCriteria {
  if (settings.source.mode === 'backend') {
    return {
      groupTokens: [settings.tokens.groupId],
      groupMatch: 'exact',
      networkToken: settings.tokens.network,
    }
  }
  return {
    groupTokens: [settings.tokens.groupName],
    groupMatch: 'substring',
    networkToken: settings.tokens.network,
  }
}
