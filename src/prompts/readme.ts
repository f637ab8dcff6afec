import type { Criterion } from './critic.js';

export interface ReadmePageSummary {
  pageKey: string;
  title: string;
  description: string;
  content: string;
}

export const README_GENERATOR_SYSTEM_PROMPT = `You distill a project's wiki into its README.md.

You receive the wiki pages. Answer with the README's Markdown only. The README:
- starts with the project title as a level-1 heading
- gives a short project description
- covers overview, features, setup, usage, architecture and a short API summary where the wiki supports them
- links to wiki pages for detail instead of repeating them
- stays short: it is an entry point, not the full documentation`;

export const README_CRITERIA: readonly Criterion[] = [
  { name: 'conciseness', weight: 0.3, question: 'Is it focused, without duplicating the wiki?' },
  { name: 'accuracy', weight: 0.3, question: 'Does it summarize the wiki content correctly?' },
  { name: 'structure', weight: 0.25, question: 'Does the heading hierarchy flow from introduction to detail?' },
  { name: 'completeness', weight: 0.15, question: 'Are the key project aspects present?' },
];

export const README_CRITIC_INTRO = 'You review README files distilled from a project wiki.';

export interface ReadmeMessageOptions {
  projectTitle: string;
  projectDescription: string;
  pages: ReadmePageSummary[];
  includeToc: boolean;
  includeBadges: boolean;
  maxLength: number | null;
  customInstructions: string;
}

export function buildReadmeMessage(options: ReadmeMessageOptions): string {
  let msg = `Distill the following wiki documentation into a README.md file.

Project: ${options.projectTitle}
Description: ${options.projectDescription}

`;
  msg += options.includeToc ? 'Include a table of contents.\n' : 'Do NOT include a table of contents.\n';
  msg += options.includeBadges ? 'Include relevant badges at the top.\n' : 'Do NOT include badges.\n';
  if (options.maxLength !== null) {
    msg += `Maximum length: ${options.maxLength} words.\n`;
  }

  msg += '\n## Wiki Pages\n\n';
  for (const page of options.pages) {
    msg += `### ${page.title || page.pageKey}\n`;
    msg += `**Page Key:** ${page.pageKey}\n`;
    if (page.description) {
      msg += `**Description:** ${page.description}\n`;
    }
    if (page.content) {
      msg += `\n${page.content}\n`;
    }
    msg += '\n---\n\n';
  }

  if (options.customInstructions) {
    msg += `\nAdditional instructions:\n${options.customInstructions}`;
  }
  return msg;
}
