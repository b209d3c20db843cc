import { z } from 'zod'

/**
 * JSON value types shared across the SDK.
 */

/**
 * Any value that survives a `JSON.stringify` / `JSON.parse` round trip.
 */
export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue }

/**
 * A JSON Schema document, as sent in a tool's `input_schema`.
 */
export type JSONSchema = { [key: string]: JSONValue }

/**
 * Validates an arbitrary JSON value.
 */
export const jsonValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
)

/**
 * Validates a JSON object, e.g. a JSON Schema document.
 */
export const jsonObjectSchema: z.ZodType<JSONSchema> = z.record(z.string(), jsonValueSchema)
