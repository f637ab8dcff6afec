/**
 * Page Generator
 *
 * Writes one wiki page. The critic gets the page's source files inlined in
 * its system prompt so it can check code references without tools.
 */

import * as fs from 'fs/promises';
import { createFilesystemTools, resolveInside } from '../llm/filesystem-tools.js';
import type { Logger } from '../logger.js';
import { buildCriticSystemPrompt } from '../prompts/critic.js';
import { buildPageMessage, formatSourceContext, PAGE_CRITERIA, PAGE_CRITIC_INTRO, PAGE_GENERATOR_SYSTEM_PROMPT } from '../prompts/page.js';
import { buildStyleSection, DEFAULT_STYLE, type DocStyle } from '../prompts/style.js';
import { loopConfig, type AgentContext } from './context.js';
import { runQualityLoop, type AgentResult } from './quality-loop.js';
import type { GeneratedPage, PageSpec } from './schemas.js';

export interface PageGeneratorInput {
  pageSpec: PageSpec;
  repoPath: string;
  relatedPages?: string[];
  customInstructions?: string;
  style?: DocStyle;
}

/**
 * Contents of each source file keyed by its repository path. Unreadable
 * files get a placeholder so the critic knows they were requested.
 */
export async function readSourceFiles(repoPath: string, sourceFiles: string[], logger?: Logger): Promise<Map<string, string>> {
  const contents = new Map<string, string>();
  for (const relPath of sourceFiles) {
    const target = resolveInside(repoPath, relPath);
    if (target === null) {
      logger?.warn(`Source file is outside the repository: ${relPath}`);
      contents.set(relPath, `[ERROR: Could not read file ${relPath}]`);
      continue;
    }
    try {
      contents.set(relPath, await fs.readFile(target, 'utf-8'));
    } catch {
      logger?.warn(`Could not read source file: ${relPath}`);
      contents.set(relPath, `[ERROR: Could not read file ${relPath}]`);
    }
  }
  return contents;
}

/**
 * Page metadata comes from the planned page; only the markdown body comes from the model.
 */
export function pageOutputParser(pageSpec: PageSpec): (raw: string) => GeneratedPage {
  return (raw) => {
    const content = raw.trim();
    if (!content) {
      throw new Error(`Empty content for page ${pageSpec.pageKey}`);
    }
    return {
      pageKey: pageSpec.pageKey,
      title: pageSpec.title,
      content,
      sourceFiles: [...pageSpec.sourceFiles],
    };
  };
}

export async function generatePage(ctx: AgentContext, input: PageGeneratorInput): Promise<AgentResult<GeneratedPage>> {
  const { pageSpec } = input;
  const customInstructions = input.customInstructions ?? '';
  const logger = ctx.logger.child(`page:${pageSpec.pageKey}`);

  const sources = await readSourceFiles(input.repoPath, pageSpec.sourceFiles, logger);

  const generator = ctx.createRole({
    role: 'pageGenerator',
    systemPrompt: PAGE_GENERATOR_SYSTEM_PROMPT + buildStyleSection(input.style ?? DEFAULT_STYLE, customInstructions),
    tools: createFilesystemTools(input.repoPath),
  });
  const critic = ctx.createRole({
    role: 'pageCritic',
    systemPrompt: `${buildCriticSystemPrompt(PAGE_CRITIC_INTRO, PAGE_CRITERIA)}\n${formatSourceContext(sources)}`,
  });

  return runQualityLoop({
    generator,
    critic,
    config: loopConfig(ctx.settings, { accuracy: ctx.settings.pageAccuracyFloor }),
    initialPrompt: buildPageMessage(pageSpec, input.relatedPages ?? pageSpec.relatedPages, customInstructions),
    parseOutput: pageOutputParser(pageSpec),
    logger,
  });
}
