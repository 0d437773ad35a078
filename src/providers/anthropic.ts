/**
 * Anthropic Generation Client
 *
 * Adapts the Messages API to the GenerationClient interface: deterministic
 * sampling (temperature 0), a bounded answer length, one attempt per call
 * with a deadline, and normalized stop reasons and content blocks.
 *
 * The SDK client is injectable so tests can replace the network with a fake
 * that records request bodies.
 */

import Anthropic from '@anthropic-ai/sdk';

import { scopedLogger, silentLogger, type Logger } from '../utils/logger.js';
import { GenerationAdapterError, GenerationTimeoutError } from './errors.js';
import { getAnthropicKey } from './validation.js';
import type {
  ContentBlock,
  GenerationClient,
  GenerationRequest,
  GenerationResponse,
  Message,
  ResponseBlock,
  StopReason,
} from './types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

/** Block shape as returned by the API; only the fields we read */
export interface RawContentBlock {
  type: string;
  text?: string;
  id?: string;
  name?: string;
  input?: unknown;
}

export interface RawMessage {
  stop_reason: string | null;
  content: readonly RawContentBlock[];
}

/**
 * The slice of the SDK client the adapter calls. A real `Anthropic`
 * instance satisfies it.
 */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { timeout?: number }
    ): PromiseLike<RawMessage>;
  };
}

export interface AnthropicClientOptions {
  model?: string;
  /** Default 800 */
  maxTokens?: number;
  /** Per-call deadline, default 60000 */
  timeoutMs?: number;
  /** Defaults to the key from ANTHROPIC_API_KEY */
  apiKey?: string;
  client?: MessagesClient;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeStopReason(reason: string | null): StopReason {
  if (reason === 'tool_use' || reason === 'end_turn') {
    return reason;
  }
  return 'other';
}

/**
 * Keep text and tool-use blocks, drop every other kind.
 */
export function normalizeContent(blocks: readonly RawContentBlock[]): ResponseBlock[] {
  const content: ResponseBlock[] = [];

  for (const block of blocks) {
    if (block.type === 'text' && typeof block.text === 'string') {
      content.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use' && typeof block.id === 'string' && typeof block.name === 'string') {
      content.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }

  return content;
}

function toContentParam(block: ContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return { type: 'tool_result', tool_use_id: block.tool_use_id, content: block.content };
  }
}

function toMessageParam(message: Message): Anthropic.MessageParam {
  return {
    role: message.role,
    content: typeof message.content === 'string' ? message.content : message.content.map(toContentParam),
  };
}

export class AnthropicGenerationClient implements GenerationClient {
  readonly model: string;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly client: MessagesClient;
  private readonly logger: Logger;

  constructor(options: AnthropicClientOptions = {}) {
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = options.maxTokens ?? 800;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.logger = scopedLogger(options.logger ?? silentLogger, 'anthropic');
    this.client =
      options.client ??
      new Anthropic({
        apiKey: options.apiKey ?? getAnthropicKey(),
        maxRetries: 0,
        timeout: this.timeoutMs,
      });
  }

  /**
   * Build the request body. Tools and tool choice appear only when tools are given.
   */
  buildParams(request: GenerationRequest): Anthropic.MessageCreateParamsNonStreaming {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      temperature: 0,
      max_tokens: this.maxTokens,
      system: request.system,
      messages: request.messages.map(toMessageParam),
    };

    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: {
          type: 'object',
          properties: tool.input_schema.properties,
          required: tool.input_schema.required,
        },
      }));
      if (request.toolChoice) {
        params.tool_choice = request.toolChoice;
      }
    }

    return params;
  }

  /**
   * @throws {GenerationTimeoutError} when the deadline passes
   * @throws {GenerationAdapterError} for any other failure
   */
  async complete(request: GenerationRequest): Promise<GenerationResponse> {
    const params = this.buildParams(request);
    this.logger.debug?.(
      `messages=${params.messages.length} tools=${params.tools?.length ?? 0} model=${this.model}`
    );

    let raw: RawMessage;
    try {
      raw = await this.client.messages.create(params, { timeout: this.timeoutMs });
    } catch (error) {
      throw this.toAdapterError(error);
    }

    const response: GenerationResponse = {
      stopReason: normalizeStopReason(raw.stop_reason),
      content: normalizeContent(raw.content),
    };
    this.logger.debug?.(`stop_reason=${raw.stop_reason ?? 'null'} blocks=${response.content.length}`);
    return response;
  }

  private toAdapterError(error: unknown): GenerationAdapterError | GenerationTimeoutError {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new GenerationTimeoutError(this.timeoutMs);
    }
    if (error instanceof Anthropic.APIError) {
      return new GenerationAdapterError(`Anthropic API error: ${error.message}`, {
        status: error.status,
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new GenerationAdapterError(`Generation failed: ${message}`, { cause: error });
  }
}
