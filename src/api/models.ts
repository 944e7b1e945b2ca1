import { z } from 'zod'

export interface Product {
  productId: string
  name: string
  description: string
  brand: string
  size: string
  price: number | null
  inStock: boolean
}

export interface Store {
  locationId: string
  name: string
  address: string
  zipCode: string
}

export interface CartItem {
  upc: string
  quantity: number
}

export interface TaskList {
  id: string
  title: string
}

export interface Task {
  id: string
  title: string
  notes: string
  status: string
}

// Raw payloads. Lenient on purpose: missing fields fall back to empty values.

const productItemSchema = z.object({
  size: z.string().default(''),
  price: z.object({ regular: z.number().optional() }).default({}),
  inventory: z.object({ stockLevel: z.string().optional() }).default({})
})

export const productSchema = z.object({
  productId: z.string().default(''),
  description: z.string().default(''),
  brand: z.string().default(''),
  items: z.array(productItemSchema).default([])
})

export const locationSchema = z.object({
  locationId: z.string().default(''),
  name: z.string().default(''),
  address: z
    .object({
      addressLine1: z.string().default(''),
      city: z.string().default(''),
      state: z.string().default(''),
      zipCode: z.string().default('')
    })
    .default({})
})

export const taskListSchema = z.object({
  id: z.string(),
  title: z.string()
})

export const taskSchema = z.object({
  id: z.string(),
  title: z.string(),
  notes: z.string().default(''),
  status: z.string().default('needsAction')
})

/** `{ data: [...] }` envelope used by the retailer API */
export function dataEnvelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({ data: z.array(item).default([]) })
}

/** `{ items: [...] }` envelope used by the task-list API */
export function itemsEnvelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({ items: z.array(item).default([]) })
}
