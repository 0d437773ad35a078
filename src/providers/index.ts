/**
 * Providers Module
 *
 * Generation backends behind the GenerationClient interface.
 *
 * ```typescript
 * import { AnthropicGenerationClient } from './providers/index.js';
 * const client = new AnthropicGenerationClient({ model: config.model });
 * const response = await client.complete({ messages, system });
 * ```
 */

export {
  AnthropicGenerationClient,
  DEFAULT_ANTHROPIC_MODEL,
  normalizeContent,
  normalizeStopReason,
  type AnthropicClientOptions,
  type MessagesClient,
  type RawMessage,
  type RawContentBlock,
} from './anthropic.js';

export { GenerationAdapterError, GenerationTimeoutError } from './errors.js';

export { validateAnthropicKey, getAnthropicKey, AnthropicKeySchema, type ValidationResult } from './validation.js';

export { textOf, toolUsesOf } from './types.js';
export type {
  Role,
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  ContentBlock,
  ResponseBlock,
  Message,
  StopReason,
  GenerationResponse,
  GenerationRequest,
  GenerationClient,
  ToolDefinition,
  ToolInputSchema,
  JsonSchemaProperty,
  ToolChoice,
} from './types.js';
