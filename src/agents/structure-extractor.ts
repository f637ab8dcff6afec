/**
 * Structure Extractor
 *
 * Plans the wiki for one scope: sections, pages and the source files each
 * page documents. The generator may browse the repository; the critic only
 * sees the proposed JSON.
 */

import { createFilesystemTools } from '../llm/filesystem-tools.js';
import { buildCriticSystemPrompt } from '../prompts/critic.js';
import { buildStyleSection, DEFAULT_STYLE, type DocStyle } from '../prompts/style.js';
import {
  buildStructureMessage,
  STRUCTURE_CRITERIA,
  STRUCTURE_CRITIC_INTRO,
  STRUCTURE_GENERATOR_SYSTEM_PROMPT,
} from '../prompts/structure.js';
import { loopConfig, type AgentContext } from './context.js';
import { parseJsonPayload } from './evaluation.js';
import { runQualityLoop, type AgentResult } from './quality-loop.js';
import { flattenPages, wikiStructureSchema, type WikiStructureSpec } from './schemas.js';

export interface StructureExtractorInput {
  fileList: string[];
  repoPath: string;
  readmeContent?: string;
  customInstructions?: string;
  style?: DocStyle;
}

/**
 * Parse generator JSON (optionally fenced). A structure without any page is
 * rejected like malformed JSON.
 */
export function parseStructureOutput(raw: string): WikiStructureSpec {
  const structure = wikiStructureSchema.parse(parseJsonPayload(raw));
  if (flattenPages(structure).length === 0) {
    throw new Error('Structure contains no pages');
  }
  return structure;
}

export async function extractStructure(
  ctx: AgentContext,
  input: StructureExtractorInput
): Promise<AgentResult<WikiStructureSpec>> {
  const customInstructions = input.customInstructions ?? '';

  const generator = ctx.createRole({
    role: 'structureGenerator',
    systemPrompt: STRUCTURE_GENERATOR_SYSTEM_PROMPT + buildStyleSection(input.style ?? DEFAULT_STYLE, customInstructions),
    tools: createFilesystemTools(input.repoPath),
  });
  const critic = ctx.createRole({
    role: 'structureCritic',
    systemPrompt: buildCriticSystemPrompt(STRUCTURE_CRITIC_INTRO, STRUCTURE_CRITERIA),
  });

  return runQualityLoop({
    generator,
    critic,
    config: loopConfig(ctx.settings, { coverage: ctx.settings.structureCoverageFloor }),
    initialPrompt: buildStructureMessage(input.fileList, input.readmeContent ?? '', customInstructions),
    parseOutput: parseStructureOutput,
    logger: ctx.logger.child('structure'),
  });
}
