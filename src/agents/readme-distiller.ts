/**
 * README Distiller
 *
 * Condenses a scope's generated pages into a README. No criterion floors:
 * a weak README never fails a job.
 */

import { buildCriticSystemPrompt } from '../prompts/critic.js';
import {
  buildReadmeMessage,
  README_CRITERIA,
  README_CRITIC_INTRO,
  README_GENERATOR_SYSTEM_PROMPT,
  type ReadmePageSummary,
} from '../prompts/readme.js';
import { buildStyleSection, DEFAULT_STYLE, type DocStyle } from '../prompts/style.js';
import { loopConfig, type AgentContext } from './context.js';
import { runQualityLoop, type AgentResult } from './quality-loop.js';
import type { ReadmeOutput } from './schemas.js';

export interface ReadmeDistillerInput {
  pages: ReadmePageSummary[];
  projectTitle: string;
  projectDescription: string;
  customInstructions?: string;
  maxLength?: number | null;
  includeToc?: boolean;
  includeBadges?: boolean;
  style?: DocStyle;
}

export function parseReadmeOutput(raw: string): ReadmeOutput {
  const content = raw.trim();
  if (!content) {
    throw new Error('Empty README content');
  }
  return { content };
}

export async function distillReadme(ctx: AgentContext, input: ReadmeDistillerInput): Promise<AgentResult<ReadmeOutput>> {
  const customInstructions = input.customInstructions ?? '';

  const generator = ctx.createRole({
    role: 'readmeGenerator',
    systemPrompt: README_GENERATOR_SYSTEM_PROMPT + buildStyleSection(input.style ?? DEFAULT_STYLE, customInstructions),
  });
  const critic = ctx.createRole({
    role: 'readmeCritic',
    systemPrompt: buildCriticSystemPrompt(README_CRITIC_INTRO, README_CRITERIA),
  });

  return runQualityLoop({
    generator,
    critic,
    config: loopConfig(ctx.settings),
    initialPrompt: buildReadmeMessage({
      projectTitle: input.projectTitle,
      projectDescription: input.projectDescription,
      pages: input.pages,
      includeToc: input.includeToc ?? true,
      includeBadges: input.includeBadges ?? false,
      maxLength: input.maxLength ?? null,
      customInstructions,
    }),
    parseOutput: parseReadmeOutput,
    logger: ctx.logger.child('readme'),
  });
}
