import type { Criterion } from './critic.js';

export const STRUCTURE_GENERATOR_SYSTEM_PROMPT = `You design the documentation structure for a code repository's wiki.

You receive the repository's file list and can read files with the read_file and list_directory tools. Study the code, then answer with a JSON wiki structure and nothing else:
{
    "title": "Project Title",
    "description": "Brief project description",
    "sections": [
        {
            "title": "Section Title",
            "description": "Section description",
            "pages": [
                {
                    "page_key": "unique-page-key",
                    "title": "Page Title",
                    "description": "What this page covers",
                    "importance": "high|medium|low",
                    "page_type": "api|module|class|overview",
                    "source_files": ["src/file1.ts", "src/file2.ts"],
                    "related_pages": ["other-page-key"]
                }
            ],
            "subsections": []
        }
    ]
}

Guidelines:
- Arrange sections and pages in a logical hierarchy
- Cover every significant source file with at least one page
- page_key values are unique, lowercase and hyphenated
- Overview pages have importance "high"
- Group related functionality; aim for one page per major component`;

export const STRUCTURE_CRITERIA: readonly Criterion[] = [
  {
    name: 'coverage',
    weight: 0.35,
    question: 'Does the structure cover all important parts of the codebase? Are significant modules missing?',
  },
  { name: 'organization', weight: 0.3, question: 'Is the hierarchy logical and are related topics grouped together?' },
  { name: 'granularity', weight: 0.2, question: 'Is the page count right: neither fragmented nor monolithic?' },
  { name: 'clarity', weight: 0.15, question: 'Are titles and descriptions clear and informative?' },
];

export const STRUCTURE_CRITIC_INTRO =
  'You review proposed wiki structures for code repositories. Judge the structure below against the criteria.';

export function buildStructureMessage(fileList: string[], readmeContent: string, customInstructions: string): string {
  let msg = 'Analyze the following repository files and produce a wiki structure specification.\n\nFiles:\n';
  msg += fileList.map((f) => `- ${f}`).join('\n');
  if (readmeContent) {
    msg += `\n\nExisting README:\n${readmeContent}`;
  }
  if (customInstructions) {
    msg += `\n\nAdditional instructions:\n${customInstructions}`;
  }
  return msg;
}
