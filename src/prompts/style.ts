/**
 * Documentation style block appended to every generator system prompt.
 */

export const DETAIL_LEVELS = ['minimal', 'standard', 'comprehensive'] as const;
export type DetailLevel = (typeof DETAIL_LEVELS)[number];

export interface DocStyle {
  audience: string;
  tone: string;
  detailLevel: DetailLevel;
}

export const DEFAULT_STYLE: DocStyle = {
  audience: 'developer',
  tone: 'technical',
  detailLevel: 'standard',
};

export function buildStyleSection(style: DocStyle = DEFAULT_STYLE, customInstructions = ''): string {
  const parts = [
    '\n\n## Documentation Style',
    `- Target audience: ${style.audience}`,
    `- Writing tone: ${style.tone}`,
    `- Detail level: ${style.detailLevel}`,
  ];

  if (style.detailLevel === 'minimal') {
    parts.push('- Keep explanations brief and focus on essentials only');
  } else if (style.detailLevel === 'comprehensive') {
    parts.push('- Provide thorough explanations with examples and edge cases');
  }

  if (customInstructions) {
    parts.push(`\n## Custom Instructions\n${customInstructions}`);
  }

  return parts.join('\n');
}
