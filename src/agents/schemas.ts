/**
 * Wiki structure schemas
 *
 * The structure generator answers in JSON. Models tend to echo the
 * snake_case keys from the prompt, so every object schema accepts both
 * `page_key` and `pageKey` spellings.
 */

import { z } from 'zod';

function camelizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, val]) => [key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()), val])
  );
}

export const IMPORTANCE_LEVELS = ['high', 'medium', 'low'] as const;
export const PAGE_TYPES = ['api', 'module', 'class', 'overview'] as const;

export const pageSpecSchema = z.preprocess(
  camelizeKeys,
  z.object({
    pageKey: z.string().min(1),
    title: z.string().min(1),
    description: z.string().default(''),
    importance: z.enum(IMPORTANCE_LEVELS).catch('medium'),
    pageType: z.enum(PAGE_TYPES).catch('module'),
    sourceFiles: z.array(z.string()).default([]),
    relatedPages: z.array(z.string()).default([]),
  })
);

export type PageSpec = z.output<typeof pageSpecSchema>;

export interface SectionSpec {
  title: string;
  description: string;
  pages: PageSpec[];
  subsections: SectionSpec[];
}

export const sectionSpecSchema: z.ZodType<SectionSpec, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    camelizeKeys,
    z.object({
      title: z.string().min(1),
      description: z.string().default(''),
      pages: z.array(pageSpecSchema).default([]),
      subsections: z.array(sectionSpecSchema).default([]),
    })
  )
);

export const wikiStructureSchema = z.preprocess(
  camelizeKeys,
  z.object({
    title: z.string().min(1),
    description: z.string().default(''),
    sections: z.array(sectionSpecSchema).default([]),
  })
);

export type WikiStructureSpec = z.output<typeof wikiStructureSchema>;

export interface GeneratedPage {
  pageKey: string;
  title: string;
  /** Raw markdown */
  content: string;
  sourceFiles: string[];
}

export interface ReadmeOutput {
  content: string;
}

export interface FlatPage {
  page: PageSpec;
  sectionPath: string[];
}

/**
 * Every page in document order: a section's own pages before its subsections.
 */
export function flattenPages(structure: { sections: SectionSpec[] }): FlatPage[] {
  const result: FlatPage[] = [];

  const visit = (section: SectionSpec, parents: string[]) => {
    const sectionPath = [...parents, section.title];
    for (const page of section.pages) {
      result.push({ page, sectionPath });
    }
    for (const sub of section.subsections) {
      visit(sub, sectionPath);
    }
  };

  for (const section of structure.sections) {
    visit(section, []);
  }
  return result;
}

/**
 * Union of every page's source files.
 */
export function coveredFiles(structure: { sections: SectionSpec[] }): Set<string> {
  return new Set(flattenPages(structure).flatMap(({ page }) => page.sourceFiles));
}
