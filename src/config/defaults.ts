/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml on top of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  model: 'claude-sonnet-4-20250514',
  docs_path: './docs',

  generation: {
    max_tokens: 800,
    timeout_ms: 60000,
  },

  orchestrator: {
    max_tool_rounds: 2,
    parallel_tool_calls: false,
  },

  search: {
    max_results: 5,
  },

  chunking: {
    chunk_size: 800,
    chunk_overlap: 100,
  },

  session: {
    max_history: 2,
  },
};

/**
 * Written to ~/.crag/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Course assistant configuration
# Location: ~/.crag/config.toml (or $CRAG_HOME/config.toml)

# Anthropic model used to answer questions
model = "${DEFAULT_CONFIG.model}"

# Folder indexed by \`crag index\` when no folder is given
docs_path = "${DEFAULT_CONFIG.docs_path}"

[generation]
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
timeout_ms = ${DEFAULT_CONFIG.generation.timeout_ms}

# The model may search or read outlines this many times before it must answer
[orchestrator]
max_tool_rounds = ${DEFAULT_CONFIG.orchestrator.max_tool_rounds}
parallel_tool_calls = ${DEFAULT_CONFIG.orchestrator.parallel_tool_calls}

[search]
max_results = ${DEFAULT_CONFIG.search.max_results}

# Changing these only affects courses indexed afterwards
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[session]
max_history = ${DEFAULT_CONFIG.session.max_history}
`;
