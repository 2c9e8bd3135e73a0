import type { TJsonValue } from '../core/types.ts'

/** Body of POST /oauth2/token/{tenantId}. */
export type TTokenResponse = {
  access_token: string
  expires_in?: number
  token_type?: string
  scope?: string
}

export type TTokenGrant = {
  accessToken: string
  /** Server-declared lifetime in seconds */
  expiresIn: number
  tokenType?: string
}

export type TSortOrder = 'ASC' | 'DESC'

/** Body accepted by the `.../query` list endpoints. */
export type TListQueryBody = {
  pageSize?: number
  page?: number
  sortOrder?: TSortOrder
  sortField?: string
  searchString?: string
  searchTargetFields?: string[]
  fields?: string[]
  filters?: TJsonValue
}

/** Page envelope returned by the `.../query` list endpoints. */
export type TPage<T> = {
  data: T[]
  totalCount?: number
  page?: number
  pageSize?: number
  fields?: string[]
}

export type TJsonObject = { [key: string]: TJsonValue }

export type TAddress = {
  addressLine?: string
  city?: string
  country?: string
  latitude?: string
  longitude?: string
  timezone?: string
  [key: string]: string | undefined
}

export type TVenue = {
  id: string
  name: string
  description?: string
  address?: TAddress
  timezone?: string
  [key: string]: TJsonValue | TAddress | undefined
}

export type TAccessPoint = {
  serialNumber: string
  name?: string
  model?: string
  venueId?: string
  apGroupId?: string
  status?: string
  [key: string]: TJsonValue | undefined
}

export type TSwitch = {
  id: string
  name?: string
  serialNumber?: string
  venueId?: string
  model?: string
  [key: string]: TJsonValue | undefined
}

export type TSwitchVlan = {
  vlanId: number
  vlanName?: string
  [key: string]: TJsonValue | undefined
}

export type TWlan = {
  id: string
  name: string
  ssid?: string
  type?: string
  [key: string]: TJsonValue | undefined
}

export type TVlanPool = {
  id: string
  name: string
  vlanMembers?: string[]
  [key: string]: TJsonValue | undefined
}

export type TVlanPoolProfile = {
  id: string
  name: string
  [key: string]: TJsonValue | undefined
}

export type TPassphraseFormat = 'MOST_SECURED' | 'SECURED' | 'SIMPLE'

export type TDpskService = {
  id: string
  name: string
  passphraseFormat?: TPassphraseFormat
  passphraseLength?: number
  deviceCountLimit?: number
  [key: string]: TJsonValue | undefined
}

export type TDpskPassphrase = {
  id: string
  username?: string
  passphrase?: string
  email?: string
  [key: string]: TJsonValue | undefined
}

export type TDpskDevice = {
  mac: string
  online?: boolean
  [key: string]: TJsonValue | undefined
}

export type TIdentityGroup = {
  id: string
  name: string
  description?: string
  dpskPoolId?: string
  [key: string]: TJsonValue | undefined
}

export type TIdentityDevice = {
  macAddress: string
  name?: string
  description?: string
  [key: string]: TJsonValue | undefined
}

export type TIdentity = {
  id: string
  name: string
  groupId?: string
  email?: string
  vlan?: number
  devices?: TIdentityDevice[]
  [key: string]: TJsonValue | TIdentityDevice[] | undefined
}
