import { addToCart } from '../api/cart'
import type { CartItem, Task } from '../api/models'
import { searchProducts } from '../api/products'
import { completeTasks, getIncompleteTasks } from '../api/tasks'
import { getProviderConfig } from '../auth/oauth-config'
import type { OAuthProviderConfig } from '../auth/oauth-types'
import { TokenClient } from '../auth/token-client'
import type { HttpClient } from '../http/http-client'
import { sessionVars, type ProviderSession, type ShopConfig } from './env-file'

export interface ShopDeps {
  http: HttpClient
  print: (line?: string) => void
  tokenClient?: TokenClient
  /** Receives the refreshed token variables before the first list or cart call */
  saveTokens?: (vars: Record<string, string>) => Promise<void>
  providers?: {
    kroger?: OAuthProviderConfig
    googleTasks?: OAuthProviderConfig
  }
  apiBaseUrls?: {
    kroger?: string
    googleTasks?: string
  }
}

export interface ShopSummary {
  added: { task: Task; upc: string }[]
  unmatched: Task[]
}

/**
 * Trades the stored refresh token for a fresh access token. Sessions without a
 * refresh token keep their stored access token. Providers that don't rotate
 * refresh tokens answer without one; the stored one stays valid then.
 */
export async function refreshSession(
  tokenClient: TokenClient,
  provider: OAuthProviderConfig,
  session: ProviderSession
): Promise<ProviderSession> {
  if (!session.refreshToken) {
    console.warn(`[shop] No refresh token stored for ${provider.id}; using the saved access token`)
    return session
  }
  const token = await tokenClient.refreshGrant(provider, session.credentials, session.refreshToken)
  return {
    credentials: session.credentials,
    accessToken: token.accessToken,
    refreshToken: token.refreshToken || session.refreshToken
  }
}

/**
 * Pulls open items from the shopping list, adds the first in-stock match for
 * each to the cart, then checks off the items that made it in.
 */
export async function runShop(stored: ShopConfig, deps: ShopDeps): Promise<ShopSummary> {
  const { http, print } = deps
  const tokenClient = deps.tokenClient ?? new TokenClient(http)

  const config: ShopConfig = {
    ...stored,
    kroger: await refreshSession(tokenClient, deps.providers?.kroger ?? getProviderConfig('kroger'), stored.kroger),
    googleTasks: await refreshSession(
      tokenClient,
      deps.providers?.googleTasks ?? getProviderConfig('google-tasks'),
      stored.googleTasks
    )
  }
  await deps.saveTokens?.(sessionVars(config))
  const krogerBase = deps.apiBaseUrls?.kroger
  const tasksBase = deps.apiBaseUrls?.googleTasks

  const tasks = await getIncompleteTasks(http, config.googleTasks.accessToken, config.taskListId, tasksBase)
  if (tasks.length === 0) {
    print('  Shopping list is empty, nothing to do.')
    return { added: [], unmatched: [] }
  }

  const summary: ShopSummary = { added: [], unmatched: [] }
  for (const task of tasks) {
    const products = await searchProducts(
      http,
      { term: task.title, accessToken: config.kroger.accessToken, locationId: config.storeId, limit: 5 },
      krogerBase
    )
    const match = products.find((product) => product.inStock)
    if (!match) {
      print(`  No in-stock match for "${task.title}"`)
      summary.unmatched.push(task)
      continue
    }
    print(`  ${task.title} -> ${match.name}`)
    summary.added.push({ task, upc: match.productId })
  }

  if (summary.added.length === 0) {
    return summary
  }

  const items: CartItem[] = summary.added.map(({ upc }) => ({ upc, quantity: 1 }))
  await addToCart(http, items, config.kroger.accessToken, krogerBase)
  print(`  Added ${items.length} item(s) to your cart.`)

  await completeTasks(
    http,
    config.googleTasks.accessToken,
    config.taskListId,
    summary.added.map(({ task }) => task.id),
    tasksBase
  )
  print(`  Checked off ${summary.added.length} item(s) on your list.`)
  return summary
}
