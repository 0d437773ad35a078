/**
 * Command runtime
 *
 * Builds the store and assistant a command needs from the loaded config.
 * Commands import these instead of constructing collaborators inline, so
 * tests can swap them for in-memory versions with vi.mock.
 */

import { CourseAssistant } from '../agent/course-assistant.js';
import type { Config } from '../config/schema.js';
import { getDb } from '../database/connection.js';
import { APIKeyError } from '../errors/index.js';
import type { ChunkingOptions } from '../indexer/types.js';
import { AnthropicGenerationClient } from '../providers/anthropic.js';
import { validateAnthropicKey } from '../providers/validation.js';
import { CourseStore } from '../search/course-store.js';
import type { Logger } from '../utils/logger.js';

export function chunkingFromConfig(config: Config): ChunkingOptions {
  return {
    chunkSize: config.chunking.chunk_size,
    chunkOverlap: config.chunking.chunk_overlap,
  };
}

export function openCourseStore(config: Config, logger: Logger): CourseStore {
  return new CourseStore(getDb(), { maxResults: config.search.max_results, logger });
}

/**
 * @throws {APIKeyError} before any work when ANTHROPIC_API_KEY is missing or malformed
 */
export function createCourseAssistant(config: Config, logger: Logger): CourseAssistant {
  const key = validateAnthropicKey();
  if (!key.valid) {
    logger.debug?.(key.error);
    throw new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY');
  }

  const client = new AnthropicGenerationClient({
    model: config.model,
    maxTokens: config.generation.max_tokens,
    timeoutMs: config.generation.timeout_ms,
    logger,
  });

  return new CourseAssistant({
    store: openCourseStore(config, logger),
    client,
    maxToolRounds: config.orchestrator.max_tool_rounds,
    parallelToolCalls: config.orchestrator.parallel_tool_calls,
    maxHistory: config.session.max_history,
    chunking: chunkingFromConfig(config),
    logger,
  });
}
