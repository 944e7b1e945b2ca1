import { z } from 'zod'

export type ProviderId = 'kroger' | 'google-tasks'

/** Where the client id/secret travel on token requests. */
export type ClientAuthPlacement = 'basic' | 'body'

export interface OAuthProviderConfig {
  id: ProviderId
  displayName: string
  authorizeUrl: string
  tokenUrl: string
  redirectPort: number
  callbackPath: string
  defaultScope: string
  clientAuth: ClientAuthPlacement
  extraAuthorizeParams: Record<string, string>
  successHeading: string
}

export interface ClientCredentials {
  clientId: string
  clientSecret: string
}

export type GrantRequest =
  | { grantType: 'client_credentials'; scope: string }
  | { grantType: 'authorization_code'; code: string; redirectUri: string }
  | { grantType: 'refresh_token'; refreshToken: string }

export type GrantType = GrantRequest['grantType']

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().default(''),
  token_type: z.string().default('Bearer'),
  expires_in: z.coerce.number().int().default(1800)
})

export interface TokenSet {
  readonly accessToken: string
  readonly refreshToken: string
  readonly tokenType: string
  readonly expiresIn: number
}
