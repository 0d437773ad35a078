/**
 * Course Assistant
 *
 * The facade the CLI talks to. Wires the course store, tool registry,
 * session history and orchestrator together:
 *
 * ```
 * query(text, sessionId?)
 *   ├── history = sessions.getConversationHistory(sessionId)
 *   ├── orchestrator.run(prompt(text), systemPrompt + history)
 *   ├── registry.resetSources()          (once, even on failure)
 *   ├── sessions.addExchange(sessionId, text, answer)
 *   └── { answer, sources }
 * ```
 *
 * A failed query throws and leaves the session as it was.
 */

import { ingestCourseDocument, ingestCourseFolder } from '../indexer/pipeline.js';
import type { ChunkingOptions, IngestResult, ParsedCourseDocument } from '../indexer/types.js';
import type { GenerationClient } from '../providers/types.js';
import type { CourseStore } from '../search/course-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_MAX_ROUNDS } from './loop-state.js';
import { ToolCallingOrchestrator } from './orchestrator.js';
import { buildSystemPrompt, buildUserPrompt, courseSystemPrompt } from './prompts.js';
import { DEFAULT_MAX_HISTORY, SessionManager } from './session.js';
import { createCourseTools, type ToolRegistry } from './tools/registry.js';
import type { Source } from './tools/types.js';

// ============================================================================
// Types
// ============================================================================

export interface CourseAssistantOptions {
  store: CourseStore;
  client: GenerationClient;
  /** Defaults to the search and outline tools over `store` */
  registry?: ToolRegistry;
  maxToolRounds?: number;
  parallelToolCalls?: boolean;
  /** Exchanges remembered per session */
  maxHistory?: number;
  chunking?: ChunkingOptions;
  logger?: Logger;
}

export interface QueryResult {
  answer: string;
  sources: Source[];
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

const DEFAULT_CHUNKING: ChunkingOptions = { chunkSize: 800, chunkOverlap: 100 };

// ============================================================================
// CourseAssistant
// ============================================================================

export class CourseAssistant {
  readonly store: CourseStore;
  readonly registry: ToolRegistry;
  readonly sessions: SessionManager;
  private readonly orchestrator: ToolCallingOrchestrator;
  private readonly systemPrompt: string;
  private readonly chunking: ChunkingOptions;
  private readonly logger: Logger;

  constructor(options: CourseAssistantOptions) {
    const maxRounds = options.maxToolRounds ?? DEFAULT_MAX_ROUNDS;

    this.store = options.store;
    this.registry = options.registry ?? createCourseTools(options.store);
    this.sessions = new SessionManager(options.maxHistory ?? DEFAULT_MAX_HISTORY);
    this.chunking = options.chunking ?? DEFAULT_CHUNKING;
    this.logger = options.logger ?? silentLogger;
    this.systemPrompt = courseSystemPrompt(maxRounds);
    this.orchestrator = new ToolCallingOrchestrator({
      client: options.client,
      registry: this.registry,
      maxRounds,
      parallelToolCalls: options.parallelToolCalls,
      logger: this.logger,
    });
  }

  /**
   * Answer a question, using and extending the session's history when given.
   *
   * @throws {ToolExecutionError} when a tool fails mid-answer
   * @throws {GenerationAdapterError} when the generation backend fails
   */
  async query(text: string, sessionId?: string): Promise<QueryResult> {
    const history = this.sessions.getConversationHistory(sessionId);

    const { answer, sources } = await this.orchestrator
      .run({
        query: buildUserPrompt(text),
        systemPrompt: buildSystemPrompt(this.systemPrompt, history),
      })
      .finally(() => this.registry.resetSources());

    if (sessionId !== undefined) {
      this.sessions.addExchange(sessionId, text, answer);
    }
    return { answer, sources };
  }

  createSession(): string {
    return this.sessions.createSession();
  }

  clearSession(sessionId: string): void {
    this.sessions.clearSession(sessionId);
  }

  getCourseAnalytics(): CourseAnalytics {
    return {
      totalCourses: this.store.getCourseCount(),
      courseTitles: this.store.getCourseTitles(),
    };
  }

  /**
   * @throws {FileNotFoundError} when the file is missing
   * @throws {DatabaseError} when the course is already indexed
   */
  async addCourseDocument(path: string): Promise<ParsedCourseDocument> {
    return ingestCourseDocument(this.store, path, { chunking: this.chunking, logger: this.logger });
  }

  async addCourseFolder(
    path: string,
    options: { clearExisting?: boolean; onFile?: (path: string, index: number, total: number) => void } = {}
  ): Promise<IngestResult> {
    return ingestCourseFolder(this.store, path, {
      chunking: this.chunking,
      logger: this.logger,
      clearExisting: options.clearExisting,
      onFile: options.onFile,
    });
  }
}
