import { modelForRole, type AgentRole, type Settings } from '../config.js';
import type { Logger } from '../logger.js';
import type { ToolExecutor } from '../llm/filesystem-tools.js';
import { ModelRole, type Role } from '../llm/role.js';
import type { LLMProvider } from '../llm/types.js';
import type { QualityLoopConfig } from './quality-loop.js';

export interface RoleRequest {
  role: AgentRole;
  systemPrompt: string;
  tools?: ToolExecutor;
}

export type RoleFactory = (request: RoleRequest) => Role;

/**
 * Dependencies shared by the agents, built once per run.
 */
export interface AgentContext {
  settings: Settings;
  createRole: RoleFactory;
  logger: Logger;
}

/**
 * Roles backed by one provider, each on the model configured for it.
 */
export function providerRoleFactory(provider: LLMProvider, settings: Settings, logger: Logger): RoleFactory {
  return ({ role, systemPrompt, tools }) =>
    new ModelRole({
      name: role,
      provider,
      model: modelForRole(settings, role),
      systemPrompt,
      tools,
      maxToolTurns: settings.maxToolTurns,
      maxTokens: settings.maxOutputTokens,
      logger: logger.child(role),
    });
}

export function loopConfig(settings: Settings, criterionFloors: Record<string, number> = {}): QualityLoopConfig {
  return {
    qualityThreshold: settings.qualityThreshold,
    maxAttempts: settings.maxAgentAttempts,
    criterionFloors,
  };
}
