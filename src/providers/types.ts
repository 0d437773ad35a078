/**
 * Generation Types
 *
 * The provider-neutral transcript and tool schema shapes that the
 * orchestrator builds and a GenerationClient sends to a model.
 * Field names of tool schemas and content blocks follow the Messages API
 * wire format so they can be passed through unchanged.
 */

export type Role = 'user' | 'assistant';

export interface TextBlock {
  readonly type: 'text';
  readonly text: string;
}

export interface ToolUseBlock {
  readonly type: 'tool_use';
  readonly id: string;
  readonly name: string;
  readonly input: Readonly<Record<string, unknown>>;
}

export interface ToolResultBlock {
  readonly type: 'tool_result';
  /** Must reference a ToolUseBlock.id from the same round */
  readonly tool_use_id: string;
  readonly content: string;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

/** Blocks a model can produce */
export type ResponseBlock = TextBlock | ToolUseBlock;

export interface Message {
  readonly role: Role;
  readonly content: string | readonly ContentBlock[];
}

export type StopReason = 'tool_use' | 'end_turn' | 'other';

export interface GenerationResponse {
  readonly stopReason: StopReason;
  readonly content: readonly ResponseBlock[];
}

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description?: string;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

export interface ToolChoice {
  type: 'auto';
}

export interface GenerationRequest {
  messages: readonly Message[];
  system: string;
  /** Omitted entirely on a tool-free call */
  tools?: readonly ToolDefinition[];
  toolChoice?: ToolChoice;
}

/**
 * Anything that can turn a transcript into the model's next turn.
 */
export interface GenerationClient {
  complete(request: GenerationRequest): Promise<GenerationResponse>;
}

export function textOf(response: GenerationResponse): string {
  const block = response.content.find((b): b is TextBlock => b.type === 'text');
  return block?.text ?? '';
}

export function toolUsesOf(response: GenerationResponse): ToolUseBlock[] {
  return response.content.filter((b): b is ToolUseBlock => b.type === 'tool_use');
}
