import { KROGER_CLIENT_SCOPE, defaultRedirectUri, getProviderConfig } from '../auth/oauth-config'
import type { InteractionIO, OAuthOrchestrator } from '../auth/oauth-orchestrator'
import type { ClientCredentials, OAuthProviderConfig } from '../auth/oauth-types'
import type { TokenClient } from '../auth/token-client'
import { SetupError } from '../errors'
import type { HttpClient } from '../http/http-client'
import { listTaskLists } from '../api/tasks'
import { findStores } from '../api/stores'
import { formatEnvFile, type SetupResult, type TaskListSetup } from './env-file'

export interface SetupWizardDeps {
  io: InteractionIO
  http: HttpClient
  tokenClient: TokenClient
  orchestrator: OAuthOrchestrator
  envPath: string
  fileExists: (path: string) => Promise<boolean>
  writeFile: (path: string, content: string) => Promise<void>
  providers?: {
    kroger?: OAuthProviderConfig
    googleTasks?: OAuthProviderConfig
  }
  apiBaseUrls?: {
    kroger?: string
    googleTasks?: string
  }
}

/**
 * Interactive `init`: verifies retailer credentials, authorizes the user with
 * both providers, picks a store and a task list, and writes the env file once.
 * Returns null when the user declines to overwrite an existing file.
 */
export async function runSetup(deps: SetupWizardDeps): Promise<SetupResult | null> {
  const { io } = deps
  const kroger = deps.providers?.kroger ?? getProviderConfig('kroger')

  io.print()
  io.print('  basketeer Setup')
  io.print('  ===============')

  if (await deps.fileExists(deps.envPath)) {
    io.print()
    io.print(`  ${deps.envPath} already exists.`)
    const answer = (await io.prompt('  Overwrite? [y/N]: ')).trim().toLowerCase()
    if (answer !== 'y') {
      io.print('  Aborted.')
      return null
    }
  }

  // Step 1: API credentials
  const credentials = await promptRetailerCredentials(io, kroger)

  io.print()
  io.print('  Verifying credentials...')
  const clientToken = await deps.tokenClient.clientCredentialsGrant(kroger, credentials, KROGER_CLIENT_SCOPE)
  io.print('  OK!')

  // Step 2: user authorization
  io.print()
  io.print('  Step 2: Connect Your Fred Meyer Account')
  io.print()
  const userToken = await deps.orchestrator.authorize(kroger, credentials)
  io.print('  OK!')

  // Step 3: store selection
  const storeId = await selectStore(deps, clientToken.accessToken)

  // Step 4 (optional): task list
  const googleTasks = await setupTaskList(deps)

  const result: SetupResult = {
    kroger: {
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
      accessToken: userToken.accessToken,
      refreshToken: userToken.refreshToken,
      storeId
    },
    googleTasks
  }
  await deps.writeFile(deps.envPath, formatEnvFile(result))

  io.print()
  io.print(`  Setup complete! Configuration saved to ${deps.envPath}`)
  io.print()
  return result
}

async function promptRetailerCredentials(io: InteractionIO, kroger: OAuthProviderConfig): Promise<ClientCredentials> {
  io.print()
  io.print('  Step 1: Kroger API Credentials')
  io.print()
  io.print('  You need a Kroger developer account.')
  io.print('  1. Go to https://developer.kroger.com')
  io.print('  2. Create a new application')
  io.print(`  3. Set the redirect URI to: ${defaultRedirectUri(kroger)}`)
  io.print('  4. Note your Client ID and Client Secret')
  io.print()

  const clientId = (await io.prompt('  Client ID: ')).trim()
  const clientSecret = (await io.prompt('  Client Secret: ')).trim()
  if (!clientId || !clientSecret) {
    throw new SetupError('Both Client ID and Client Secret are required.')
  }
  return { clientId, clientSecret }
}

async function selectStore(deps: SetupWizardDeps, accessToken: string): Promise<string> {
  const { io } = deps
  io.print()
  io.print('  Step 3: Select Your Store')
  io.print()
  const zipCode = (await io.prompt('  ZIP code: ')).trim()

  io.print('  Searching for nearby Fred Meyer stores...')
  const stores = await findStores(deps.http, { zipCode, accessToken }, deps.apiBaseUrls?.kroger)

  if (stores.length === 0) {
    io.print('  No Fred Meyer stores found near that ZIP code.')
    return (await io.prompt('  Enter a store ID manually: ')).trim()
  }

  io.print()
  stores.forEach((store, i) => io.print(`    ${i + 1}. ${store.name} (${store.address})`))
  io.print()

  const choice = await io.prompt('  Select a store [1]: ')
  return pickByNumber(stores, choice).locationId
}

async function setupTaskList(deps: SetupWizardDeps): Promise<TaskListSetup | null> {
  const { io } = deps
  const provider = deps.providers?.googleTasks ?? getProviderConfig('google-tasks')

  io.print()
  io.print('  Step 4: Google Tasks Shopping List (Optional)')
  io.print()
  io.print('  You can connect a Google Tasks list to use as your shopping list.')
  io.print('  When starting an order, items will be pulled from that list.')
  io.print("  After adding them to your cart, they'll be checked off automatically.")
  io.print()

  const answer = (await io.prompt('  Set up Google Tasks? [y/N]: ')).trim().toLowerCase()
  if (answer !== 'y') {
    io.print('  Skipped.')
    return null
  }

  io.print()
  io.print('  You need Google Cloud OAuth2 credentials with the Tasks API enabled.')
  io.print('  1. Go to https://console.cloud.google.com/apis/credentials')
  io.print('  2. Create an OAuth 2.0 Client ID (Desktop or Web app)')
  io.print(`  3. Add ${defaultRedirectUri(provider)} as an authorized redirect URI`)
  io.print('  4. Enable the Google Tasks API for your project')
  io.print()

  const clientId = (await io.prompt('  Google Client ID: ')).trim()
  const clientSecret = (await io.prompt('  Google Client Secret: ')).trim()
  if (!clientId || !clientSecret) {
    io.print('  Both Client ID and Client Secret are required.')
    io.print('  Skipping Google Tasks setup.')
    return null
  }

  io.print()
  io.print('  Connecting your Google account...')
  io.print()
  const token = await deps.orchestrator.authorize(provider, { clientId, clientSecret })
  io.print('  OK!')

  const listId = await selectTaskList(deps, token.accessToken)
  return {
    clientId,
    clientSecret,
    accessToken: token.accessToken,
    refreshToken: token.refreshToken,
    listId
  }
}

async function selectTaskList(deps: SetupWizardDeps, accessToken: string): Promise<string> {
  const { io } = deps
  io.print()
  io.print('  Fetching your Google Tasks lists...')
  const lists = await listTaskLists(deps.http, accessToken, deps.apiBaseUrls?.googleTasks)

  if (lists.length === 0) {
    io.print('  No task lists found in your Google account.')
    return (await io.prompt('  Enter a task list ID manually: ')).trim()
  }

  io.print()
  lists.forEach((list, i) => io.print(`    ${i + 1}. ${list.title}`))
  io.print()

  const selected = pickByNumber(lists, await io.prompt('  Select a list [1]: '))
  io.print(`  Selected: ${selected.title}`)
  return selected.id
}

/** 1-based selection; an empty answer picks the first entry. */
export function pickByNumber<T>(options: readonly T[], answer: string): T {
  const choice = answer.trim() || '1'
  const index = /^\d+$/.test(choice) ? Number(choice) - 1 : -1
  const picked = options[index]
  if (index < 0 || picked === undefined) {
    throw new SetupError('Invalid selection.')
  }
  return picked
}
