/**
 * wikiforge
 *
 * Library entry point. The CLI lives in cli.ts.
 */

export * from './errors.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
export { ConfigManager, resolveSettings, modelForRole, AGENT_ROLES, type AgentRole, type Config, type Settings } from './config.js';

export { createLLMProvider, ModelRole, createFilesystemTools, AnthropicProvider, OllamaProvider } from './llm/index.js';
export type { LLMProvider, Role, RoleResponse, ToolExecutor } from './llm/index.js';

export { TokenUsage, type TokenUsageSnapshot } from './agents/token-usage.js';
export { createEvaluation, parseEvaluation, type EvaluationResult } from './agents/evaluation.js';
export { runQualityLoop, type AgentResult, type QualityLoopConfig, type QualityLoopParams } from './agents/quality-loop.js';
export { providerRoleFactory, type AgentContext, type RoleFactory } from './agents/context.js';
export { extractStructure } from './agents/structure-extractor.js';
export { generatePage } from './agents/page-generator.js';
export { distillReadme } from './agents/readme-distiller.js';
export { flattenPages, type GeneratedPage, type PageSpec, type ReadmeOutput, type SectionSpec, type WikiStructureSpec } from './agents/schemas.js';

export { chunkMarkdown, countTokens, type ChunkOptions, type ChunkResult } from './rag/chunker.js';
export { EmbeddingService, cosineSimilarity, type Embedder } from './rag/embeddings.js';

export { JsonFileStore } from './store/json-store.js';
export * from './store/types.js';
export { SimpleGitProvider, parseNameStatus, type ChangedFile, type GitProvider } from './git/repository.js';

export type { PipelineContext } from './pipeline/context.js';
export { runFullGeneration, runIncrementalUpdate, QUALITY_GATE_FAILED, type FullGenerationRequest, type IncrementalUpdateRequest, type JobOutcome } from './pipeline/jobs.js';
export { processScope, type ScopeResult, type ScopeRun } from './pipeline/scope-processing.js';
export { processScopeIncremental, partitionPages, detectStructuralChanges } from './pipeline/incremental.js';
export { discoverScopes, loadScopeConfig, parseScopeConfig, type ScopeConfig } from './pipeline/scope-config.js';
export type { QualityReport, TokenReport, PageScore } from './pipeline/metrics.js';

export { exportWiki, renderPage } from './export.js';
export { WikiMCPServer, type WikiServerConfig } from './mcp-wiki-server.js';
