import * as fs from 'fs/promises';
import * as path from 'path';
import type { LLMTool } from './types.js';

/**
 * Tools a generator role can call, plus the code that runs them.
 */
export interface ToolExecutor {
  tools: LLMTool[];
  execute(name: string, input: Record<string, unknown>): Promise<string>;
}

const MAX_READ_BYTES = 200_000;

/**
 * Absolute path of `relative` under `repoPath`, or null when it would
 * escape the repository.
 */
export function resolveInside(repoPath: string, relative: unknown): string | null {
  const root = path.resolve(repoPath);
  const target = path.resolve(root, typeof relative === 'string' ? relative : '');
  if (target !== root && !target.startsWith(root + path.sep)) {
    return null;
  }
  return target;
}

/**
 * Read-only repository access for generators. Paths are relative to the
 * repository root and may not escape it.
 */
export function createFilesystemTools(repoPath: string): ToolExecutor {
  const root = path.resolve(repoPath);

  return {
    tools: [
      {
        name: 'read_file',
        description: 'Read the contents of a file from the repository',
        parameters: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'Path to the file relative to repository root' },
          },
          required: ['path'],
        },
      },
      {
        name: 'list_directory',
        description: 'List files and directories in a path',
        parameters: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'Path to the directory relative to repository root' },
          },
          required: ['path'],
        },
      },
    ],

    async execute(name, input) {
      const target = resolveInside(root, input.path);
      if (target === null) {
        return `Error: Path is outside the repository: ${String(input.path)}`;
      }

      try {
        switch (name) {
          case 'read_file': {
            const stat = await fs.stat(target);
            if (!stat.isFile()) {
              return `Error: Not a file: ${String(input.path)}`;
            }
            const content = await fs.readFile(target, 'utf-8');
            return content.length > MAX_READ_BYTES
              ? `${content.slice(0, MAX_READ_BYTES)}\n... [truncated, ${content.length} characters total]`
              : content;
          }

          case 'list_directory': {
            const entries = await fs.readdir(target, { withFileTypes: true });
            return entries
              .filter((e) => !e.name.startsWith('.'))
              .map((e) => `${e.isDirectory() ? '[DIR]' : '[FILE]'} ${e.name}`)
              .sort()
              .join('\n');
          }

          default:
            return `Error: Unknown tool: ${name}`;
        }
      } catch (error) {
        return `Error: ${error instanceof Error ? error.message : String(error)}`;
      }
    },
  };
}
