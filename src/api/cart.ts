import { KROGER_API_BASE } from '../auth/oauth-config'
import { CartError } from '../errors'
import { bearer, type HttpClient } from '../http/http-client'
import type { CartItem } from './models'
import { assertStatus } from './response'

/** Adds items to the authenticated user's cart. Needs a user token, not a client token. */
export async function addToCart(
  http: HttpClient,
  items: CartItem[],
  accessToken: string,
  baseUrl = KROGER_API_BASE
): Promise<void> {
  const response = await http.send({
    method: 'PUT',
    url: `${baseUrl}/cart/add`,
    headers: bearer(accessToken),
    json: { items: items.map((item) => ({ upc: item.upc, quantity: item.quantity })) }
  })
  assertStatus(response, [200, 204], 'Add to cart', CartError)
}
