import { KROGER_API_BASE } from '../auth/oauth-config'
import { ProductSearchError } from '../errors'
import { bearer, type HttpClient } from '../http/http-client'
import { dataEnvelope, productSchema, type Product } from './models'
import { assertStatus, parseBody } from './response'
import type { z } from 'zod'

export interface ProductSearch {
  term: string
  accessToken: string
  locationId: string
  limit?: number
}

export async function searchProducts(
  http: HttpClient,
  search: ProductSearch,
  baseUrl = KROGER_API_BASE
): Promise<Product[]> {
  const response = await http.send({
    method: 'GET',
    url: `${baseUrl}/products`,
    headers: bearer(search.accessToken),
    query: {
      'filter.term': search.term,
      'filter.locationId': search.locationId,
      'filter.limit': search.limit ?? 10
    }
  })
  assertStatus(response, [200], 'Product search', ProductSearchError)

  const { data } = parseBody(response, dataEnvelope(productSchema), 'Product search', ProductSearchError)
  return data.map(toProduct)
}

function toProduct(raw: z.output<typeof productSchema>): Product {
  const first = raw.items[0]
  return {
    productId: raw.productId,
    name: raw.description,
    description: raw.description,
    brand: raw.brand,
    size: first?.size ?? '',
    price: first?.price.regular ?? null,
    inStock: first?.inventory.stockLevel !== 'TEMPORARILY_OUT_OF_STOCK'
  }
}
