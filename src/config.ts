/**
 * Client defaults and configuration resolution.
 */

import { z } from 'zod'
import { ConfigError } from './errors.js'

/**
 * Model used when neither the request nor the client names one.
 */
export const DEFAULT_MODEL = 'claude-3-7-sonnet-20250219'

/**
 * Max-token budget used when neither the request nor the client sets one.
 */
export const DEFAULT_MAX_TOKENS = 1024

/**
 * Environment variable holding the API key.
 */
export const API_KEY_ENV = 'ANTHROPIC_API_KEY'

/**
 * Value of the `anthropic-version` header.
 */
export const DEFAULT_API_VERSION = '2023-06-01'

/**
 * Base URL of the API.
 */
export const DEFAULT_BASE_URL = 'https://api.anthropic.com'

/**
 * Settings of a {@link MessagesClient}.
 */
export interface ClientConfig {
  /**
   * API key. Falls back to the `ANTHROPIC_API_KEY` environment variable.
   */
  apiKey?: string

  /**
   * Base URL of the API, without the `/v1/messages` path.
   */
  baseUrl?: string

  /**
   * Model used for requests that do not name one.
   */
  model?: string

  /**
   * Max-token budget for requests that do not set one.
   */
  maxTokens?: number

  /**
   * Value of the `anthropic-version` header.
   */
  apiVersion?: string

  /**
   * Beta features, sent as the `anthropic-beta` header.
   */
  betas?: string[]
}

/**
 * Configuration after defaults and the credential have been resolved.
 */
export type ResolvedClientConfig = Required<ClientConfig>

const clientConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.url(),
  model: z.string().min(1),
  maxTokens: z.number().int().positive(),
  apiVersion: z.string().min(1),
  betas: z.array(z.string().min(1)),
})

/**
 * Resolves the API key from an explicit value or the environment.
 *
 * An empty explicit value counts as absent.
 *
 * @param explicit - Key passed by the caller
 * @param env - Environment to read the fallback from
 * @returns The API key
 * @throws \{ConfigError\} When no key is available
 */
export function resolveApiKey(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) {
    return explicit
  }
  const fromEnv = env[API_KEY_ENV]
  if (fromEnv) {
    return fromEnv
  }
  throw new ConfigError(`No API key provided and ${API_KEY_ENV} environment variable not set.`)
}

/**
 * Applies defaults to a client configuration and validates it.
 *
 * @param config - Caller configuration
 * @param env - Environment for the credential fallback
 * @returns The resolved configuration
 * @throws \{ConfigError\} When the key is missing or a setting is invalid
 */
export function resolveClientConfig(config?: ClientConfig, env: NodeJS.ProcessEnv = process.env): ResolvedClientConfig {
  const result = clientConfigSchema.safeParse({
    apiKey: resolveApiKey(config?.apiKey, env),
    baseUrl: (config?.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    model: config?.model ?? DEFAULT_MODEL,
    maxTokens: config?.maxTokens ?? DEFAULT_MAX_TOKENS,
    apiVersion: config?.apiVersion ?? DEFAULT_API_VERSION,
    betas: config?.betas ?? [],
  })
  if (!result.success) {
    throw new ConfigError(`Invalid client configuration:\n${z.prettifyError(result.error)}`, { cause: result.error })
  }
  return result.data
}
