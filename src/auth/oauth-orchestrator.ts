import { ListenerUnavailableError, NoCodeObtainedError } from '../errors'
import { DEFAULT_CALLBACK_TIMEOUT_MS, startCallbackListener, type CallbackListener } from './callback-listener'
import { defaultRedirectUri } from './oauth-config'
import type { TokenClient } from './token-client'
import type { ClientCredentials, OAuthProviderConfig, TokenSet } from './oauth-types'

/** The user-facing side of an authorization: a browser, a terminal. */
export interface InteractionIO {
  print: (line?: string) => void
  prompt: (question: string) => Promise<string>
  openUrl: (url: string) => Promise<void>
}

export interface OAuthOrchestratorOptions {
  callbackTimeoutMs?: number
  listenerHost?: string
}

export class OAuthOrchestrator {
  private callbackTimeoutMs: number
  private listenerHost: string | undefined

  constructor(
    private tokenClient: TokenClient,
    private io: InteractionIO,
    options: OAuthOrchestratorOptions = {}
  ) {
    this.callbackTimeoutMs = options.callbackTimeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS
    this.listenerHost = options.listenerHost
  }

  buildAuthorizationUrl(
    provider: OAuthProviderConfig,
    clientId: string,
    redirectUri: string = defaultRedirectUri(provider),
    scope: string = provider.defaultScope
  ): string {
    const params = new URLSearchParams({
      scope,
      response_type: 'code',
      client_id: clientId,
      redirect_uri: redirectUri,
      ...provider.extraAuthorizeParams
    })
    return `${provider.authorizeUrl}?${params.toString()}`
  }

  async authorize(provider: OAuthProviderConfig, credentials: ClientCredentials): Promise<TokenSet> {
    const { code, redirectUri } = await this.obtainCode(provider, credentials.clientId)
    if (!code) {
      throw new NoCodeObtainedError(provider.id)
    }

    this.io.print(`  Exchanging ${provider.displayName} authorization code...`)
    return this.tokenClient.authorizationCodeGrant(provider, credentials, code, redirectUri)
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async obtainCode(
    provider: OAuthProviderConfig,
    clientId: string
  ): Promise<{ code: string | null; redirectUri: string }> {
    let listener: CallbackListener
    try {
      listener = await startCallbackListener({
        port: provider.redirectPort,
        host: this.listenerHost,
        callbackPath: provider.callbackPath,
        successHeading: provider.successHeading
      })
    } catch (err) {
      if (!(err instanceof ListenerUnavailableError)) throw err
      return this.promptForCode(provider, clientId)
    }

    const redirectUri = defaultRedirectUri(provider, listener.port)
    const authUrl = this.buildAuthorizationUrl(provider, clientId, redirectUri)

    try {
      this.io.print(`  Opening your browser to authorize ${provider.displayName} access...`)
      this.io.print(`  (If it doesn't open, visit: ${authUrl})`)
      await this.io.openUrl(authUrl).catch((err: unknown) => {
        console.warn(`[oauth] Could not open a browser for ${provider.id}:`, err)
      })
      this.io.print()
      this.io.print('  Waiting for authorization...')

      const code = await listener.waitForCode(this.callbackTimeoutMs)
      return { code, redirectUri }
    } finally {
      await listener.close()
    }
  }

  private async promptForCode(
    provider: OAuthProviderConfig,
    clientId: string
  ): Promise<{ code: string | null; redirectUri: string }> {
    const redirectUri = defaultRedirectUri(provider)
    const authUrl = this.buildAuthorizationUrl(provider, clientId, redirectUri)

    this.io.print('  Visit this URL to authorize:')
    this.io.print(`  ${authUrl}`)
    this.io.print()
    this.io.print("  After authorizing, you'll be redirected to a localhost URL.")
    this.io.print("  Copy the 'code' parameter from that URL.")
    this.io.print()

    const code = (await this.io.prompt('  Authorization code: ')).trim()
    return { code: code || null, redirectUri }
  }
}
