/**
 * Tool-Calling Orchestrator
 *
 * Runs a bounded conversation between a generation client and a tool
 * registry:
 *
 * ```
 * run(query)
 *   ├── history = [user(query)]
 *   ├── complete(history, tools?)            ◀──────────────┐
 *   ├── stop reason tool_use and phase continue?            │
 *   │     ├── append assistant(response content)            │
 *   │     ├── execute each tool_use in order                │
 *   │     ├── append user(tool_result…) if any              │
 *   │     └── round += 1 ───────────────────────────────────┘
 *   └── answer = first text block of the last response
 * ```
 *
 * After `maxRounds` tool rounds one more call is made with no tools at all,
 * so the model has to answer. Unknown tool names become a tool result the
 * model can read; any other tool failure aborts the run.
 */

import type {
  GenerationClient,
  GenerationResponse,
  Message,
  ToolDefinition,
  ToolResultBlock,
  ToolUseBlock,
} from '../providers/types.js';
import { textOf, toolUsesOf } from '../providers/types.js';
import { scopedLogger, silentLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_MAX_ROUNDS, initialPhase, offersTools, phaseAfterRound, settlePhase, type LoopPhase } from './loop-state.js';
import { UnknownToolError } from './tools/errors.js';
import type { ToolRegistry } from './tools/registry.js';
import type { Source, ToolOutput } from './tools/types.js';

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorOptions {
  client: GenerationClient;
  /** Default registry for runs that don't pass one */
  registry?: ToolRegistry;
  /** Tool rounds before the forced tool-free call. Default: 2 */
  maxRounds?: number;
  /** Run the tool uses of one round concurrently. Results keep request order. */
  parallelToolCalls?: boolean;
  logger?: Logger;
}

export interface RunOptions {
  query: string;
  systemPrompt: string;
  registry?: ToolRegistry;
  maxRounds?: number;
}

export interface OrchestrationResult {
  /** First text block of the final response, '' when it has none */
  answer: string;
  /** Sources of the last tool output in this run that carried any */
  sources: Source[];
  /** Completed tool rounds */
  rounds: number;
  generationCalls: number;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class ToolCallingOrchestrator {
  private readonly client: GenerationClient;
  private readonly registry?: ToolRegistry;
  private readonly maxRounds: number;
  private readonly parallelToolCalls: boolean;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.client = options.client;
    this.registry = options.registry;
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.parallelToolCalls = options.parallelToolCalls ?? false;
    this.logger = scopedLogger(options.logger ?? silentLogger, 'orchestrator');
  }

  /**
   * @throws {ToolExecutionError} when a tool fails; no further calls are made
   * @throws {GenerationAdapterError} when the generation client fails
   */
  async run(options: RunOptions): Promise<OrchestrationResult> {
    const registry = options.registry ?? this.registry;
    const maxRounds = options.maxRounds ?? this.maxRounds;
    const definitions = registry?.getDefinitions() ?? [];

    const messages: Message[] = [{ role: 'user', content: options.query }];
    let sources: Source[] = [];
    let round = 0;
    let generationCalls = 0;

    const generate = (phase: LoopPhase): Promise<GenerationResponse> => {
      generationCalls += 1;
      this.logger.debug?.(`call ${generationCalls}: round=${round} phase=${phase} messages=${messages.length}`);
      return this.client.complete({
        // Copied so the request doesn't change as the history grows
        messages: [...messages],
        system: options.systemPrompt,
        ...toolsFor(phase, definitions),
      });
    };

    let phase = initialPhase(definitions.length, maxRounds);
    let response = await generate(phase);
    phase = settlePhase(phase, response);

    while (phase !== 'done') {
      messages.push({ role: 'assistant', content: response.content });

      const uses = toolUsesOf(response);
      const outputs = await this.executeAll(registry, uses);

      const results: ToolResultBlock[] = uses.map((use, i) => ({
        type: 'tool_result',
        tool_use_id: use.id,
        content: outputs[i]?.content ?? '',
      }));
      for (const output of outputs) {
        if (output.sources !== undefined) {
          sources = output.sources;
        }
      }
      if (results.length > 0) {
        messages.push({ role: 'user', content: results });
      }

      round += 1;
      phase = phaseAfterRound(round, maxRounds);
      response = await generate(phase);
      phase = settlePhase(phase, response);
    }

    this.logger.debug?.(`done after ${round} rounds, ${generationCalls} calls`);
    return { answer: textOf(response), sources, rounds: round, generationCalls };
  }

  private async executeAll(registry: ToolRegistry | undefined, uses: readonly ToolUseBlock[]): Promise<ToolOutput[]> {
    if (this.parallelToolCalls) {
      return Promise.all(uses.map((use) => this.executeOne(registry, use)));
    }

    const outputs: ToolOutput[] = [];
    for (const use of uses) {
      outputs.push(await this.executeOne(registry, use));
    }
    return outputs;
  }

  private async executeOne(registry: ToolRegistry | undefined, use: ToolUseBlock): Promise<ToolOutput> {
    this.logger.debug?.(`tool ${use.name} ${JSON.stringify(use.input)}`);

    if (registry === undefined) {
      return { content: new UnknownToolError(use.name).message };
    }
    try {
      return await registry.execute(use.name, use.input);
    } catch (error) {
      if (error instanceof UnknownToolError) {
        this.logger.debug?.(error.message);
        return { content: error.message };
      }
      throw error;
    }
  }
}

function toolsFor(
  phase: LoopPhase,
  definitions: readonly ToolDefinition[]
): { tools?: readonly ToolDefinition[]; toolChoice?: { type: 'auto' } } {
  return offersTools(phase) ? { tools: definitions, toolChoice: { type: 'auto' } } : {};
}
