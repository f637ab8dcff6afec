/**
 * Shared critic prompt scaffolding. Each agent supplies its weighted
 * criteria; the JSON answer format is the same for all of them.
 */

export interface Criterion {
  name: string;
  weight: number;
  question: string;
}

export function criteriaWeights(criteria: readonly Criterion[]): Record<string, number> {
  return Object.fromEntries(criteria.map((c) => [c.name, c.weight]));
}

export function buildCriticSystemPrompt(intro: string, criteria: readonly Criterion[]): string {
  const criteriaLines = criteria.map((c) => `- ${c.name} (weight: ${c.weight.toFixed(2)}): ${c.question}`).join('\n');
  const scoreLines = criteria.map((c) => `        "${c.name}": <float 1.0-10.0>`).join(',\n');
  const weightLines = criteria.map((c) => `        "${c.name}": ${c.weight.toFixed(2)}`).join(',\n');

  return `${intro}

Score each criterion from 1.0 to 10.0. The overall score is the weighted mean.

Criteria (weighted):
${criteriaLines}

Respond with a single JSON object and nothing else:
{
    "score": <float 1.0-10.0>,
    "passed": <bool>,
    "feedback": "<specific, actionable improvements>",
    "criteria_scores": {
${scoreLines}
    },
    "criteria_weights": {
${weightLines}
    }
}
`;
}
