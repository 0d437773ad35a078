/**
 * Agent Module
 *
 * Tool-calling orchestration over the course store.
 *
 * @example
 * ```typescript
 * import { CourseAssistant } from './agent/index.js';
 *
 * const assistant = new CourseAssistant({ store, client });
 * const session = assistant.createSession();
 * const { answer, sources } = await assistant.query('What does lesson 2 cover?', session);
 * ```
 */

export {
  CourseAssistant,
  type CourseAssistantOptions,
  type CourseAnalytics,
  type QueryResult,
} from './course-assistant.js';

export {
  ToolCallingOrchestrator,
  type OrchestratorOptions,
  type OrchestrationResult,
  type RunOptions,
} from './orchestrator.js';

export {
  DEFAULT_MAX_ROUNDS,
  initialPhase,
  phaseAfterRound,
  isTerminal,
  settlePhase,
  offersTools,
  type LoopPhase,
} from './loop-state.js';

export { courseSystemPrompt, buildSystemPrompt, buildUserPrompt } from './prompts.js';

export { SessionManager, DEFAULT_MAX_HISTORY, type SessionMessage } from './session.js';

export { formatCitations, dedupeSources } from './citations.js';

export * from './tools/index.js';
