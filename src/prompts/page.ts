import type { PageSpec } from '../agents/schemas.js';
import type { Criterion } from './critic.js';

export const PAGE_GENERATOR_SYSTEM_PROMPT = `You write one wiki page about a specific part of a codebase.

You receive the page specification and can read the source files with the read_file and list_directory tools. Read them before writing.

Answer with the page's Markdown only, no JSON and no surrounding code fence. The page:
- starts with a level-1 heading matching the page title
- cites real code with language-tagged code blocks
- explains functionality, parameters and return values
- includes usage examples where they help
- links related pages by their page keys

By page type:
- "api": endpoints, request and response formats, authentication, error codes
- "module": purpose, key functions and classes, dependencies
- "class": hierarchy, methods, properties, usage patterns
- "overview": architecture, getting started, key concepts`;

export const PAGE_CRITERIA: readonly Criterion[] = [
  {
    name: 'accuracy',
    weight: 0.35,
    question: 'Are code references correct, with no invented APIs, parameters or return types? Do examples match the source?',
  },
  { name: 'completeness', weight: 0.3, question: 'Does the page cover the key functions, classes and endpoints of its source files?' },
  { name: 'clarity', weight: 0.2, question: 'Is the writing clear and well structured, with helpful examples?' },
  { name: 'formatting', weight: 0.15, question: 'Is the Markdown correct, with language-tagged code blocks and a sound heading hierarchy?' },
];

export const PAGE_CRITIC_INTRO =
  'You review generated wiki pages. You receive the page content; the source files it documents are listed below. Check every code reference against them.';

export function buildPageMessage(page: PageSpec, relatedPages: string[], customInstructions: string): string {
  let msg = `Generate a wiki documentation page with the following specification:

Page key: ${page.pageKey}
Title: ${page.title}
Description: ${page.description}
Type: ${page.pageType}
Importance: ${page.importance}

Source files:
`;
  msg += page.sourceFiles.map((f) => `- ${f}`).join('\n');

  if (relatedPages.length > 0) {
    msg += '\n\nRelated pages (cross-reference where relevant):\n';
    msg += relatedPages.map((p) => `- ${p}`).join('\n');
  }
  if (customInstructions) {
    msg += `\n\nAdditional instructions:\n${customInstructions}`;
  }
  return msg;
}

/**
 * Source listing appended to the critic's system prompt.
 */
export function formatSourceContext(sources: ReadonlyMap<string, string>): string {
  let block = '## Source Files for Verification\n\n';
  for (const [path, content] of sources) {
    block += `### ${path}\n\`\`\`\n${content}\n\`\`\`\n\n`;
  }
  return block;
}
