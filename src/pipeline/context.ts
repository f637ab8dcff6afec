import type { AgentContext } from '../agents/context.js';
import type { GitProvider } from '../git/repository.js';
import type { Embedder } from '../rag/embeddings.js';
import type { WikiStore } from '../store/types.js';

/**
 * Everything a pipeline run needs, passed in explicitly.
 */
export interface PipelineContext extends AgentContext {
  store: WikiStore;
  embedder: Embedder;
  git: GitProvider;
}
