/**
 * Tool Registry
 *
 * Name → tool dispatch table, built once at startup. Definitions come back in
 * registration order so every generation call sees the same tool list.
 *
 * The registry also keeps the sources of the most recent tool output that
 * carried any. That slot is shared by every query using this registry;
 * the orchestrator returns sources per run, which callers should prefer.
 */

import type { ToolDefinition } from '../../providers/types.js';
import type { CourseStore } from '../../search/course-store.js';
import { DuplicateToolError, ToolExecutionError, UnknownToolError } from './errors.js';
import { OutlineTool } from './outline-tool.js';
import { SearchTool } from './search-tool.js';
import type { CourseTool, Source, ToolOutput } from './types.js';

export class ToolRegistry {
  private readonly tools = new Map<string, CourseTool>();
  private lastSources: Source[] = [];

  /**
   * @throws {DuplicateToolError} when a tool with the same name exists
   */
  register(tool: CourseTool): this {
    const name = tool.definition.name;
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  /**
   * @throws {UnknownToolError} when no tool has this name
   * @throws {ToolExecutionError} when the tool itself throws
   */
  async execute(name: string, input: Readonly<Record<string, unknown>>): Promise<ToolOutput> {
    const tool = this.tools.get(name);
    if (tool === undefined) {
      throw new UnknownToolError(name);
    }

    let output: ToolOutput;
    try {
      output = await tool.execute(input);
    } catch (error) {
      throw new ToolExecutionError(name, error);
    }

    if (output.sources !== undefined) {
      this.lastSources = output.sources;
    }
    return output;
  }

  getLastSources(): Source[] {
    return [...this.lastSources];
  }

  resetSources(): void {
    this.lastSources = [];
  }
}

/**
 * Registry with the search and outline tools over one store.
 */
export function createCourseTools(store: CourseStore): ToolRegistry {
  return new ToolRegistry().register(new SearchTool(store)).register(new OutlineTool(store));
}
