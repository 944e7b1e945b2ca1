import { z } from 'zod'
import type { ClientCredentials } from '../auth/oauth-types'
import { ConfigError } from '../errors'

export const DEFAULT_ENV_FILE = '.env'

export interface RetailerSetup {
  clientId: string
  clientSecret: string
  accessToken: string
  refreshToken: string
  storeId: string
}

export interface TaskListSetup {
  clientId: string
  clientSecret: string
  accessToken: string
  refreshToken: string
  listId: string
}

export interface SetupResult {
  kroger: RetailerSetup
  googleTasks: TaskListSetup | null
}

export function resolveEnvPath(env: NodeJS.ProcessEnv = process.env): string {
  return env['BASKETEER_ENV_FILE'] || DEFAULT_ENV_FILE
}

export function formatEnvFile(result: SetupResult): string {
  const { kroger, googleTasks } = result
  let content =
    `KROGER_CLIENT_ID=${kroger.clientId}\n` +
    `KROGER_CLIENT_SECRET=${kroger.clientSecret}\n` +
    `KROGER_ACCESS_TOKEN=${kroger.accessToken}\n` +
    `KROGER_REFRESH_TOKEN=${kroger.refreshToken}\n` +
    `KROGER_STORE_ID=${kroger.storeId}\n`

  if (googleTasks) {
    content +=
      '\n# Google Tasks shopping list\n' +
      `GOOGLE_CLIENT_ID=${googleTasks.clientId}\n` +
      `GOOGLE_CLIENT_SECRET=${googleTasks.clientSecret}\n` +
      `GOOGLE_ACCESS_TOKEN=${googleTasks.accessToken}\n` +
      `GOOGLE_REFRESH_TOKEN=${googleTasks.refreshToken}\n` +
      `GOOGLE_TASKS_LIST_ID=${googleTasks.listId}\n`
  }
  return content
}

export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {}
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eqIndex = trimmed.indexOf('=')
    if (eqIndex === -1) continue
    const key = trimmed.slice(0, eqIndex).trim()
    const value = trimmed.slice(eqIndex + 1).trim()
    if (key) vars[key] = value
  }
  return vars
}

const shopConfigSchema = z.object({
  KROGER_CLIENT_ID: z.string().min(1),
  KROGER_CLIENT_SECRET: z.string().min(1),
  KROGER_ACCESS_TOKEN: z.string().min(1),
  KROGER_REFRESH_TOKEN: z.string().default(''),
  KROGER_STORE_ID: z.string().min(1),
  GOOGLE_CLIENT_ID: z.string().min(1),
  GOOGLE_CLIENT_SECRET: z.string().min(1),
  GOOGLE_ACCESS_TOKEN: z.string().min(1),
  GOOGLE_REFRESH_TOKEN: z.string().default(''),
  GOOGLE_TASKS_LIST_ID: z.string().min(1)
})

/** Stored credentials and tokens for one provider. */
export interface ProviderSession {
  credentials: ClientCredentials
  accessToken: string
  refreshToken: string
}

export interface ShopConfig {
  kroger: ProviderSession
  googleTasks: ProviderSession
  storeId: string
  taskListId: string
}

export function loadShopConfig(vars: Record<string, string>): ShopConfig {
  const parsed = shopConfigSchema.safeParse(vars)
  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')
    throw new ConfigError(`Configuration incomplete (${missing}). Run "basketeer init" first.`)
  }
  const env = parsed.data
  return {
    kroger: {
      credentials: { clientId: env.KROGER_CLIENT_ID, clientSecret: env.KROGER_CLIENT_SECRET },
      accessToken: env.KROGER_ACCESS_TOKEN,
      refreshToken: env.KROGER_REFRESH_TOKEN
    },
    googleTasks: {
      credentials: { clientId: env.GOOGLE_CLIENT_ID, clientSecret: env.GOOGLE_CLIENT_SECRET },
      accessToken: env.GOOGLE_ACCESS_TOKEN,
      refreshToken: env.GOOGLE_REFRESH_TOKEN
    },
    storeId: env.KROGER_STORE_ID,
    taskListId: env.GOOGLE_TASKS_LIST_ID
  }
}

/** Variables that change when the access tokens are refreshed. */
export function sessionVars(config: ShopConfig): Record<string, string> {
  return {
    KROGER_ACCESS_TOKEN: config.kroger.accessToken,
    KROGER_REFRESH_TOKEN: config.kroger.refreshToken,
    GOOGLE_ACCESS_TOKEN: config.googleTasks.accessToken,
    GOOGLE_REFRESH_TOKEN: config.googleTasks.refreshToken
  }
}

/**
 * Rewrites the given keys in place and appends the ones not yet present.
 * Comments, ordering and every other line stay as they are.
 */
export function updateEnvFile(content: string, updates: Record<string, string>): string {
  const pending = new Map(Object.entries(updates))
  const lines = content.split('\n').map((line) => {
    const trimmed = line.trim()
    const eqIndex = trimmed.indexOf('=')
    if (trimmed.startsWith('#') || eqIndex === -1) return line
    const key = trimmed.slice(0, eqIndex).trim()
    const value = pending.get(key)
    if (value === undefined) return line
    pending.delete(key)
    return `${key}=${value}`
  })

  const appended = [...pending].map(([key, value]) => `${key}=${value}`)
  if (lines[lines.length - 1] === '') {
    lines.splice(lines.length - 1, 0, ...appended)
  } else {
    lines.push(...appended)
  }
  return lines.join('\n')
}
