/**
 * Agent Tools
 *
 * The closed set of tools the model may call while answering a question.
 */

export { ToolRegistry, createCourseTools } from './registry.js';
export { SearchTool, SearchInputSchema, SEARCH_TOOL_NAME, noResultsMessage } from './search-tool.js';
export { OutlineTool, OutlineInputSchema, OUTLINE_TOOL_NAME, formatOutline } from './outline-tool.js';
export { DuplicateToolError, UnknownToolError, ToolExecutionError } from './errors.js';
export {
  invalidInput,
  type CourseTool,
  type Source,
  type ToolOutput,
  type SearchBackend,
  type OutlineBackend,
} from './types.js';
