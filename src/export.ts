/**
 * Markdown export
 *
 * Writes the latest pages of every scope as markdown files with front matter,
 * one directory per scope, plus the scope's README and an index page.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import matter from 'gray-matter';
import { flattenPages } from './agents/schemas.js';
import type { PageRecord, StructureRecord, WikiStore } from './store/types.js';

export interface ExportOptions {
  store: WikiStore;
  repositoryId: string;
  branch: string;
  outputDir: string;
}

export interface ExportSummary {
  scopes: number;
  pages: number;
  files: string[];
}

export function renderPage(page: PageRecord, structure: StructureRecord, sectionPath: string[]): string {
  return matter.stringify(`${page.content.trim()}\n`, {
    title: page.title,
    description: page.description,
    section: sectionPath.join(' / '),
    pageType: page.pageType,
    importance: page.importance,
    sourceFiles: page.sourceFiles,
    relatedPages: page.relatedPages,
    qualityScore: page.qualityScore,
    passedQualityGate: page.passedQualityGate,
    structureVersion: structure.version,
    commit: structure.commitSha,
  });
}

function renderIndex(structure: StructureRecord, entries: Array<{ page: PageRecord; sectionPath: string[] }>): string {
  const lines = [`# ${structure.title}`, ''];
  if (structure.description) lines.push(structure.description, '');

  let lastSection = '';
  for (const { page, sectionPath } of entries) {
    const section = sectionPath.join(' / ');
    if (section !== lastSection) {
      lines.push(`## ${section}`, '');
      lastSection = section;
    }
    lines.push(`- [${page.title}](./${page.pageKey}.md)${page.description ? ` - ${page.description}` : ''}`);
  }
  return `${lines.join('\n')}\n`;
}

export async function exportWiki(options: ExportOptions): Promise<ExportSummary> {
  const { store } = options;
  const summary: ExportSummary = { scopes: 0, pages: 0, files: [] };

  const write = async (relPath: string, content: string) => {
    const target = path.join(options.outputDir, relPath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
    summary.files.push(relPath);
  };

  for (const structure of await store.getLatestStructures(options.repositoryId, options.branch)) {
    const stored = new Map((await store.getPagesForStructure(structure.id)).map((p) => [p.pageKey, p]));
    const entries = flattenPages(structure).flatMap(({ page, sectionPath }) => {
      const record = stored.get(page.pageKey);
      return record ? [{ page: record, sectionPath }] : [];
    });

    const dir = structure.scopePath === '.' ? '' : structure.scopePath;
    for (const { page, sectionPath } of entries) {
      await write(path.join(dir, `${page.pageKey}.md`), renderPage(page, structure, sectionPath));
    }
    await write(path.join(dir, 'index.md'), renderIndex(structure, entries));
    if (structure.readme) {
      await write(path.join(dir, 'README.md'), `${structure.readme.content.trim()}\n`);
    }

    summary.scopes++;
    summary.pages += entries.length;
  }

  return summary;
}

/**
 * Write a scope's distilled README into the repository.
 */
export async function writeScopeReadme(repoPath: string, scopePath: string, outputPath: string, content: string): Promise<string> {
  const target = path.join(repoPath, scopePath, outputPath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, `${content.trim()}\n`, 'utf-8');
  return target;
}
