import { KROGER_API_BASE } from '../auth/oauth-config'
import { StoreError } from '../errors'
import { bearer, type HttpClient } from '../http/http-client'
import { dataEnvelope, locationSchema, type Store } from './models'
import { assertStatus, parseBody } from './response'

export const DEFAULT_CHAIN = 'FRED MEYER'

export interface StoreSearch {
  zipCode: string
  accessToken: string
  chain?: string
  limit?: number
}

export async function findStores(http: HttpClient, search: StoreSearch, baseUrl = KROGER_API_BASE): Promise<Store[]> {
  const response = await http.send({
    method: 'GET',
    url: `${baseUrl}/locations`,
    headers: bearer(search.accessToken),
    query: {
      'filter.zipCode.near': search.zipCode,
      'filter.chain': search.chain ?? DEFAULT_CHAIN,
      'filter.limit': search.limit ?? 5
    }
  })
  assertStatus(response, [200], 'Store lookup', StoreError)

  const { data } = parseBody(response, dataEnvelope(locationSchema), 'Store lookup', StoreError)
  return data.map((raw) => ({
    locationId: raw.locationId,
    name: raw.name,
    address: `${raw.address.addressLine1}, ${raw.address.city}, ${raw.address.state}`,
    zipCode: raw.address.zipCode
  }))
}
