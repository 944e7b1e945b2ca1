export { OAuthOrchestrator } from './oauth-orchestrator'
export { TokenClient } from './token-client'
export { startCallbackListener } from './callback-listener'
export { getProviderConfig, defaultRedirectUri } from './oauth-config'
export type { InteractionIO, OAuthOrchestratorOptions } from './oauth-orchestrator'
export type { CallbackListener, CallbackCapture, ListenerState } from './callback-listener'
export type {
  ProviderId,
  ClientAuthPlacement,
  OAuthProviderConfig,
  ClientCredentials,
  GrantRequest,
  GrantType,
  TokenSet
} from './oauth-types'
