import { z } from 'zod'
import { ResponseParseError } from '../errors.js'
import { jsonObjectSchema } from '../types/json.js'
import type { ToolUseBlockData } from '../types/messages.js'
import type { CustomTool } from './types.js'

/**
 * Configuration for a tool whose input is described by a zod schema.
 */
export interface ZodToolConfig<TInput extends z.ZodObject> {
  name: string
  description: string
  inputSchema: TInput
}

/**
 * A custom tool declaration paired with the schema that validates its input.
 */
export interface ZodTool<TInput extends z.ZodObject> {
  /**
   * Declaration to pass to `MessagesRequest.withTool`.
   */
  readonly spec: CustomTool

  /**
   * Validates the input of a tool use addressed to this tool.
   *
   * @param toolUse - Tool use emitted by the model
   * @returns The typed input
   * @throws \{ResponseParseError\} When the input does not match the schema
   */
  parseInput(toolUse: ToolUseBlockData): z.infer<TInput>
}

/**
 * Creates a custom tool from a zod object schema.
 *
 * @example
 * ```typescript
 * const getStockPrice = tool({
 *   name: 'get_stock_price',
 *   description: 'Get the current stock price for a given ticker symbol.',
 *   inputSchema: z.object({ ticker: z.string().describe('The stock ticker symbol, e.g. AAPL') }),
 * })
 *
 * const request = new MessagesRequest().withTool(getStockPrice.spec)
 * ```
 */
export function tool<TInput extends z.ZodObject>(config: ZodToolConfig<TInput>): ZodTool<TInput> {
  const { $schema: _dialect, ...schema } = jsonObjectSchema.parse(z.toJSONSchema(config.inputSchema))

  return {
    spec: {
      type: 'custom',
      name: config.name,
      description: config.description,
      inputSchema: schema,
    },
    parseInput(toolUse: ToolUseBlockData): z.infer<TInput> {
      const result = config.inputSchema.safeParse(toolUse.input)
      if (!result.success) {
        throw new ResponseParseError(`Invalid input for tool '${config.name}':\n${z.prettifyError(result.error)}`, {
          cause: result.error,
        })
      }
      return result.data
    },
  }
}
