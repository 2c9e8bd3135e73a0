// Main client
export { RuckusOneClient } from './client/ruckus-one.ts'
export type { TRuckusOneClientOptions } from './client/ruckus-one.ts'

// Core
export { ApiGateway, classifyError } from './core/api-gateway.ts'
export type { TApiGatewayOptions } from './core/api-gateway.ts'
export { TokenAuthority, TOKEN_SAFETY_MARGIN_MS } from './domains/auth/token-authority.ts'
export type { TTokenAuthorityOptions, TTokenState } from './domains/auth/token-authority.ts'
export { AuthApi } from './domains/auth/auth.api.ts'
export type { TAuthApiOptions, TTokenExchange } from './domains/auth/auth.api.ts'
export { buildListQuery, DEFAULT_PAGE_SIZE } from './core/query.ts'
export type { TListOptions } from './core/query.ts'
export { logger, setLogLevel, getLogLevel } from './core/logger.ts'
export type { TLogLevel } from './core/logger.ts'

// Providers - Endpoints
export {
  RegionEndpoint,
  RUCKUS_REGIONS,
  DEFAULT_REGION,
  resolveRegionHost,
  isRegion,
} from './providers/endpoint/region-endpoint.ts'

// Resource modules
export { VenuesApi } from './domains/venues/venues.api.ts'
export type { TCreateVenueInput } from './domains/venues/venues.api.ts'
export { AccessPointsApi } from './domains/access-points/access-points.api.ts'
export { SwitchesApi } from './domains/switches/switches.api.ts'
export { WlansApi } from './domains/wlans/wlans.api.ts'
export type {
  TCreateWlanInput,
  TDeployOptions,
  TVenueWlansOptions,
} from './domains/wlans/wlans.api.ts'
export { VlansApi } from './domains/vlans/vlans.api.ts'
export type {
  TCreateVlanPoolInput,
  TCreateVlanPoolProfileInput,
} from './domains/vlans/vlans.api.ts'
export { DpskApi } from './domains/dpsk/dpsk.api.ts'
export type { TCreateDpskServiceInput, TDeviceInput } from './domains/dpsk/dpsk.api.ts'
export { IdentityGroupsApi } from './domains/identity-groups/identity-groups.api.ts'
export type {
  TCreateIdentityGroupInput,
  TCreateIdentityInput,
  TIdentityGroupQuery,
} from './domains/identity-groups/identity-groups.api.ts'
export { IdentitiesApi } from './domains/identities/identities.api.ts'
export type {
  TAddDeviceOptions,
  TIdentityExportOptions,
  TIdentityListOptions,
  TIdentityQuery,
} from './domains/identities/identities.api.ts'

// Errors
export {
  RuckusOneError,
  ConfigurationError,
  AuthenticationError,
  APIError,
  ResourceNotFoundError,
  ValidationError,
  RateLimitError,
  ServerError,
  isRuckusOneError,
} from './core/errors.ts'
export type { TErrorKind, TErrorDetail, TResourceRef } from './core/errors.ts'

// Types
export type {
  TRegion,
  TJsonValue,
  TCredentials,
  TEndpointProvider,
  TTokenProvider,
  THttpMethod,
  TQueryParams,
  TRequestOptions,
  TRawRequestOptions,
  TDecodedBody,
} from './core/types.ts'

export type {
  TTokenGrant,
  TTokenResponse,
  TSortOrder,
  TListQueryBody,
  TPage,
  TJsonObject,
  TAddress,
  TVenue,
  TAccessPoint,
  TSwitch,
  TSwitchVlan,
  TWlan,
  TVlanPool,
  TVlanPoolProfile,
  TPassphraseFormat,
  TDpskService,
  TDpskPassphrase,
  TDpskDevice,
  TIdentityGroup,
  TIdentityDevice,
  TIdentity,
} from './types/api.ts'
