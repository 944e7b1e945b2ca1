import type { OAuthProviderConfig, ProviderId } from './oauth-types'

export const KROGER_API_BASE = 'https://api.kroger.com/v1'
export const GOOGLE_TASKS_API_BASE = 'https://tasks.googleapis.com/tasks/v1'

/** Scope for the credential check and store lookup, which need no user context. */
export const KROGER_CLIENT_SCOPE = 'product.compact'

const KROGER: OAuthProviderConfig = {
  id: 'kroger',
  displayName: 'Kroger',
  authorizeUrl: `${KROGER_API_BASE}/connect/oauth2/authorize`,
  tokenUrl: `${KROGER_API_BASE}/connect/oauth2/token`,
  redirectPort: 8888,
  callbackPath: '/callback',
  defaultScope: 'cart.basic:write product.compact profile.compact',
  clientAuth: 'basic',
  extraAuthorizeParams: {},
  successHeading: 'Authorization successful!'
}

// Google only issues a refresh token with offline access and a forced consent screen
const GOOGLE_TASKS: OAuthProviderConfig = {
  id: 'google-tasks',
  displayName: 'Google Tasks',
  authorizeUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
  tokenUrl: 'https://oauth2.googleapis.com/token',
  redirectPort: 8889,
  callbackPath: '/callback',
  defaultScope: 'https://www.googleapis.com/auth/tasks',
  clientAuth: 'body',
  extraAuthorizeParams: {
    access_type: 'offline',
    prompt: 'consent'
  },
  successHeading: 'Google authorization successful!'
}

export function getProviderConfig(providerId: ProviderId): OAuthProviderConfig {
  switch (providerId) {
    case 'kroger':
      return KROGER
    case 'google-tasks':
      return GOOGLE_TASKS
  }
}

export function defaultRedirectUri(provider: OAuthProviderConfig, port = provider.redirectPort): string {
  return `http://localhost:${port}${provider.callbackPath}`
}
