import { AuthError, InvalidGrantRequestError } from '../errors'
import { HttpClient, parseJson } from '../http/http-client'
import { defaultRedirectUri } from './oauth-config'
import { tokenResponseSchema } from './oauth-types'
import type {
  ClientCredentials,
  GrantRequest,
  GrantType,
  OAuthProviderConfig,
  TokenSet
} from './oauth-types'

const OPERATION: Record<GrantType, string> = {
  client_credentials: 'get client token',
  authorization_code: 'exchange authorization code',
  refresh_token: 'refresh token'
}

export class TokenClient {
  constructor(private http: HttpClient = new HttpClient()) {}

  clientCredentialsGrant(
    provider: OAuthProviderConfig,
    credentials: ClientCredentials,
    scope: string = provider.defaultScope
  ): Promise<TokenSet> {
    return this.exchange(provider, credentials, { grantType: 'client_credentials', scope })
  }

  authorizationCodeGrant(
    provider: OAuthProviderConfig,
    credentials: ClientCredentials,
    code: string,
    redirectUri: string = defaultRedirectUri(provider)
  ): Promise<TokenSet> {
    return this.exchange(provider, credentials, { grantType: 'authorization_code', code, redirectUri })
  }

  refreshGrant(
    provider: OAuthProviderConfig,
    credentials: ClientCredentials,
    refreshToken: string
  ): Promise<TokenSet> {
    return this.exchange(provider, credentials, { grantType: 'refresh_token', refreshToken })
  }

  async exchange(
    provider: OAuthProviderConfig,
    credentials: ClientCredentials,
    request: GrantRequest
  ): Promise<TokenSet> {
    validateGrantRequest(request)

    const form = grantForm(request)
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (provider.clientAuth === 'basic') {
      const encoded = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64')
      headers['Authorization'] = `Basic ${encoded}`
    } else {
      form['client_id'] = credentials.clientId
      form['client_secret'] = credentials.clientSecret
    }

    const operation = OPERATION[request.grantType]
    const response = await this.http.send({ method: 'POST', url: provider.tokenUrl, headers, form })

    if (response.status !== 200) {
      throw new AuthError(
        `Failed to ${operation}: ${response.status} ${response.body}`,
        response.status,
        response.body
      )
    }

    const parsed = tokenResponseSchema.safeParse(parseJson(response.body))
    if (!parsed.success) {
      throw new AuthError(
        `Failed to ${operation}: token endpoint returned no token data`,
        response.status,
        response.body
      )
    }

    return Object.freeze({
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      tokenType: parsed.data.token_type,
      expiresIn: parsed.data.expires_in
    })
  }
}

export function validateGrantRequest(request: GrantRequest): void {
  switch (request.grantType) {
    case 'authorization_code':
      if (!request.code) throw new InvalidGrantRequestError('authorization_code grant requires a code')
      if (!request.redirectUri) throw new InvalidGrantRequestError('authorization_code grant requires a redirect_uri')
      return
    case 'refresh_token':
      if (!request.refreshToken) throw new InvalidGrantRequestError('refresh_token grant requires a refresh token')
      return
    case 'client_credentials':
      return
  }
}

function grantForm(request: GrantRequest): Record<string, string> {
  switch (request.grantType) {
    case 'client_credentials':
      return { grant_type: request.grantType, scope: request.scope }
    case 'authorization_code':
      return { grant_type: request.grantType, code: request.code, redirect_uri: request.redirectUri }
    case 'refresh_token':
      return { grant_type: request.grantType, refresh_token: request.refreshToken }
  }
}
