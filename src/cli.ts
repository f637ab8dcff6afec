#!/usr/bin/env node

import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { providerRoleFactory } from './agents/context.js';
import { ConfigManager, type Config, type Settings } from './config.js';
import { errorMessage } from './errors.js';
import { exportWiki, writeScopeReadme } from './export.js';
import { SimpleGitProvider } from './git/repository.js';
import { createLLMProvider } from './llm/index.js';
import { createLogger, type Logger } from './logger.js';
import { WikiMCPServer } from './mcp-wiki-server.js';
import type { PipelineContext } from './pipeline/context.js';
import { runFullGeneration, runIncrementalUpdate, type JobOutcome } from './pipeline/jobs.js';
import { loadScopeConfig } from './pipeline/scope-config.js';
import { EmbeddingService } from './rag/embeddings.js';
import { JsonFileStore } from './store/json-store.js';
import type { JobRecord, RepositoryProvider, RepositoryRecord } from './store/types.js';

// Load .env from current working directory (supports global installation)
const workingDir = process.cwd();
loadEnv({ path: resolve(workingDir, '.env') });

const program = new Command();

program
  .name('wikiforge')
  .description('Generate quality-gated documentation wikis for code repositories.')
  .version('0.1.0');

interface RepoOptions {
  repo: string;
  branch?: string;
  token?: string;
  verbose?: boolean;
}

interface RunOptions extends RepoOptions {
  model?: string;
  threshold?: number;
  maxAttempts?: number;
  writeReadme?: boolean;
}

const git = new SimpleGitProvider();

function isRemote(repo: string): boolean {
  return /^(https?:\/\/|git@|ssh:\/\/)/.test(repo);
}

function providerFor(repo: string): RepositoryProvider {
  if (!isRemote(repo)) return 'local';
  if (repo.includes('github.com')) return 'github';
  if (repo.includes('bitbucket.org')) return 'bitbucket';
  return 'git';
}

/** Store key for a repository: the URL, or the absolute local path */
function repositoryKey(repo: string): string {
  return isRemote(repo) ? repo : path.resolve(repo);
}

async function loadSettings(overrides: Partial<Config> = {}): Promise<{ manager: ConfigManager; settings: Settings }> {
  const manager = new ConfigManager();
  await manager.load();
  return { manager, settings: manager.resolve(overrides, workingDir) };
}

/**
 * Local checkout for the repository, cloning remote URLs first.
 */
async function checkout(options: RepoOptions, settings: Settings): Promise<string> {
  if (!isRemote(options.repo)) {
    const local = path.resolve(options.repo);
    if (!fs.existsSync(local)) {
      throw new Error(`Repository path does not exist: ${local}`);
    }
    return local;
  }

  const repoName = options.repo.split('/').pop()?.replace(/\.git$/, '') || 'repo';
  const dest = path.join(path.dirname(settings.storePath), 'repos', repoName);
  return git.clone(options.repo, dest, { branch: options.branch, token: options.token });
}

async function findRepository(store: JsonFileStore, repo: string): Promise<RepositoryRecord> {
  const record = await store.findRepositoryByUrl(repositoryKey(repo));
  if (!record) {
    throw new Error(`No wiki found for ${repo}. Run \`wikiforge generate -r ${repo}\` first.`);
  }
  return record;
}

function createEmbedder(settings: Settings, logger?: Logger): EmbeddingService {
  return new EmbeddingService({
    host: settings.ollamaHost,
    model: settings.embeddingModel,
    batchSize: settings.embeddingBatchSize,
    timeoutMs: settings.embeddingTimeoutMs,
    logger,
  });
}

async function buildContext(settings: Settings, store: JsonFileStore, logger: Logger): Promise<{ ctx: PipelineContext; close: () => Promise<void> }> {
  const provider = await createLLMProvider({
    provider: settings.provider,
    apiKey: settings.apiKey,
    model: settings.defaultModel,
    ollamaHost: settings.ollamaHost,
  });
  const info = provider.getModelInfo();
  logger.info(`Using ${info.isLocal ? 'local' : 'hosted'} model ${info.name} (context ${info.contextLength} tokens)`);

  const ctx: PipelineContext = {
    settings,
    logger,
    createRole: providerRoleFactory(provider, settings, logger),
    store,
    embedder: createEmbedder(settings, logger.child('embeddings')),
    git,
  };
  return { ctx, close: () => provider.shutdown() };
}

function requireApiKey(settings: Settings): void {
  if (settings.provider === 'anthropic' && !settings.apiKey) {
    console.log(chalk.red('❌ No API key found.'));
    console.log(chalk.yellow('\nSet your Anthropic API key:'));
    console.log(chalk.gray('  export ANTHROPIC_API_KEY=your-key-here'));
    console.log(chalk.yellow('\nOr use a local Ollama model:'));
    console.log(chalk.gray('  WIKIFORGE_PROVIDER=ollama wikiforge generate -r ./repo'));
    process.exit(1);
  }
}

function printJob(job: JobRecord): void {
  const status = job.status === 'COMPLETED' ? chalk.green(job.status) : chalk.red(job.status);
  console.log(chalk.white('\nJob:'), chalk.gray(job.id), status);
  if (job.commitSha) console.log(chalk.white('Commit:'), chalk.gray(job.commitSha.slice(0, 7)));
  if (job.noChanges) console.log(chalk.green('✓ No changes since the last generation.'));
  if (job.errorMessage) console.log(chalk.red(`Error: ${job.errorMessage}`));
  for (const warning of job.configWarnings) console.log(chalk.yellow(`⚠ ${warning}`));

  const report = job.qualityReport;
  if (report) {
    console.log(chalk.cyan.bold('\nQuality'));
    const overall = `${report.overallScore.toFixed(2)} / threshold ${report.qualityThreshold}`;
    console.log(chalk.white('  Overall:'), report.passed ? chalk.green(overall) : chalk.yellow(overall));
    if (report.structureScore !== null) console.log(chalk.white('  Structure:'), report.structureScore.toFixed(2));
    if (report.readmeScore !== null) console.log(chalk.white('  README:'), report.readmeScore.toFixed(2));
    console.log(chalk.white('  Pages:'), `${report.totalPages} (${report.pagesBelowFloor} below floor)`);
    if (report.criticDegraded) {
      console.log(chalk.yellow('  ⚠ Some evaluations fell back to an automatic pass because the critic failed.'));
    }
    for (const page of report.pageScores) {
      const mark = page.belowFloor ? chalk.red('✗') : page.passed ? chalk.green('✓') : chalk.yellow('~');
      console.log(`  ${mark} ${page.pageKey} ${chalk.gray(`${page.score.toFixed(1)} in ${page.attempts} attempt(s)`)}`);
    }
    if (report.regeneratedPages) {
      console.log(chalk.white('  Regenerated:'), report.regeneratedPages.length > 0 ? report.regeneratedPages.join(', ') : 'none');
    }
  }

  if (job.tokenUsage) {
    const { total, byAgent } = job.tokenUsage;
    console.log(chalk.cyan.bold('\nTokens'));
    console.log(chalk.white('  Total:'), `${total.totalTokens} (${total.inputTokens} in / ${total.outputTokens} out, ${total.calls} calls)`);
    for (const [agent, usage] of Object.entries(byAgent)) {
      if (usage.calls > 0) console.log(chalk.gray(`  ${agent}: ${usage.totalTokens}`));
    }
  }
}

async function writeReadmes(outcome: JobOutcome, repoPath: string): Promise<void> {
  for (const scope of outcome.scopes) {
    if (!scope.readme) continue;
    const config = await loadScopeConfig(repoPath, scope.scopePath);
    const target = await writeScopeReadme(repoPath, scope.scopePath, config.readme.outputPath, scope.readme);
    console.log(chalk.green('✓ Wrote'), chalk.gray(target));
  }
}

function runOverrides(options: RunOptions): Partial<Config> {
  return {
    defaultModel: options.model,
    qualityThreshold: options.threshold,
    maxAgentAttempts: options.maxAttempts,
    verbose: options.verbose,
  };
}

function fail(error: unknown): never {
  console.error(chalk.red('\n❌ Error:'), errorMessage(error));
  process.exit(1);
}

// Config command
program
  .command('config')
  .description('Show or change configuration')
  .option('--show', 'Show current configuration')
  .option('--api-key <key>', 'Save an Anthropic API key to the config file')
  .option('--model <model>', 'Save the default model')
  .action(async (options: { show?: boolean; apiKey?: string; model?: string }) => {
    try {
      const { manager, settings } = await loadSettings();

      if (options.apiKey || options.model) {
        await manager.save({ apiKey: options.apiKey, defaultModel: options.model });
        console.log(chalk.green('✓ Configuration saved'));
        return;
      }

      if (options.show) {
        console.log(chalk.cyan('\n📋 Current Configuration:'));
        console.log(chalk.gray('API Key:'), settings.apiKey ? '***' + settings.apiKey.slice(-4) : chalk.red('Not set'));
        console.log(chalk.gray('Source:'), process.env.ANTHROPIC_API_KEY ? 'Environment variable' : 'Config file');
        console.log(chalk.gray('Provider:'), settings.provider);
        console.log(chalk.gray('Default model:'), settings.defaultModel);
        for (const [role, model] of Object.entries(settings.agentModels)) {
          console.log(chalk.gray(`  ${role}:`), model);
        }
        console.log(chalk.gray('Quality threshold:'), settings.qualityThreshold);
        console.log(chalk.gray('Max attempts:'), settings.maxAgentAttempts);
        console.log(chalk.gray('Floors:'), `coverage ${settings.structureCoverageFloor}, accuracy ${settings.pageAccuracyFloor}`);
        console.log(chalk.gray('Chunking:'), `${settings.chunkMaxTokens} max / ${settings.chunkOverlapTokens} overlap / ${settings.chunkMinTokens} min tokens`);
        console.log(chalk.gray('Embedding model:'), settings.embeddingModel);
        console.log(chalk.gray('Store:'), settings.storePath);
        return;
      }

      console.log(chalk.yellow('\n🔐 API Key Configuration\n'));
      console.log(chalk.white('Create a .env file in the working directory:\n'));
      console.log(chalk.gray('  echo "ANTHROPIC_API_KEY=your-key-here" > .env\n'));
      console.log(chalk.white('Or save it to ~/.wikiforge/config.json:\n'));
      console.log(chalk.gray('  wikiforge config --api-key your-key-here\n'));
    } catch (error) {
      fail(error);
    }
  });

// Generate command - full generation for every scope
program
  .command('generate')
  .description('Generate the wiki for a repository')
  .requiredOption('-r, --repo <path|url>', 'Local path or git URL')
  .option('-b, --branch <branch>', 'Branch to document (default: current branch)')
  .option('-t, --token <token>', 'Access token for private repositories')
  .option('-m, --model <model>', 'Model for every agent role')
  .option('--threshold <score>', 'Quality threshold (1-10)', parseFloat)
  .option('--max-attempts <n>', 'Generator attempts per agent', (v) => parseInt(v, 10))
  .option('--write-readme', 'Write each scope README into the repository')
  .option('-v, --verbose', 'Verbose output')
  .action(async (options: RunOptions) => {
    try {
      const { settings } = await loadSettings(runOverrides(options));
      requireApiKey(settings);
      const logger = createLogger('wikiforge', { verbose: settings.verbose });

      console.log(chalk.cyan.bold('\n📚 wikiforge\n'));
      console.log(chalk.white('Repository:'), chalk.green(options.repo));

      const repoPath = await checkout(options, settings);
      const branch = options.branch ?? (await git.getCurrentBranch(repoPath));
      console.log(chalk.white('Branch:'), chalk.green(branch));
      console.log(chalk.white('Store:'), chalk.green(settings.storePath));
      console.log();

      const store = await JsonFileStore.open(settings.storePath);
      const repository = await store.upsertRepository({
        url: repositoryKey(options.repo),
        provider: providerFor(options.repo),
        defaultBranch: branch,
      });

      const { ctx, close } = await buildContext(settings, store, logger);
      const spinner = ora('Generating wiki...').start();
      let outcome: JobOutcome;
      try {
        outcome = await runFullGeneration(ctx, { repositoryId: repository.id, repoPath, branch });
      } finally {
        await close();
      }

      if (outcome.job.status === 'COMPLETED') {
        spinner.succeed('Wiki generated');
      } else {
        spinner.fail('Wiki generation failed');
      }
      printJob(outcome.job);

      if (options.writeReadme) {
        await writeReadmes(outcome, repoPath);
      }
      if (outcome.job.status !== 'COMPLETED') process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

// Update command - incremental regeneration from the last generated commit
program
  .command('update')
  .description('Regenerate only the pages affected by changes since the last generation')
  .requiredOption('-r, --repo <path|url>', 'Local path or git URL')
  .option('-b, --branch <branch>', 'Branch to update (default: current branch)')
  .option('-t, --token <token>', 'Access token for private repositories')
  .option('--since <sha>', 'Diff against this commit instead of the stored baseline')
  .option('-f, --force', 'Regenerate every scope in full')
  .option('-m, --model <model>', 'Model for every agent role')
  .option('--threshold <score>', 'Quality threshold (1-10)', parseFloat)
  .option('--max-attempts <n>', 'Generator attempts per agent', (v) => parseInt(v, 10))
  .option('--write-readme', 'Write each regenerated scope README into the repository')
  .option('-v, --verbose', 'Verbose output')
  .action(async (options: RunOptions & { since?: string; force?: boolean }) => {
    try {
      const { settings } = await loadSettings(runOverrides(options));
      requireApiKey(settings);
      const logger = createLogger('wikiforge', { verbose: settings.verbose });

      const store = await JsonFileStore.open(settings.storePath);
      const repository = await findRepository(store, options.repo);
      const repoPath = await checkout(options, settings);
      const branch = options.branch ?? (await git.getCurrentBranch(repoPath));

      console.log(chalk.cyan.bold('\n📝 Update Wiki\n'));
      console.log(chalk.white('Repository:'), chalk.green(options.repo));
      console.log(chalk.white('Branch:'), chalk.green(branch));
      const baseline = options.since ?? (await store.getBaselineSha(repository.id, branch));
      if (baseline) console.log(chalk.white('Since commit:'), chalk.green(baseline.slice(0, 7)));
      console.log();

      const { ctx, close } = await buildContext(settings, store, logger);
      const spinner = ora('Updating wiki...').start();
      let outcome: JobOutcome;
      try {
        outcome = await runIncrementalUpdate(ctx, {
          repositoryId: repository.id,
          repoPath,
          branch,
          baseSha: options.since,
          force: options.force,
        });
      } finally {
        await close();
      }

      if (outcome.job.status === 'COMPLETED') {
        spinner.succeed(outcome.job.noChanges ? 'Wiki is up to date' : 'Wiki updated');
      } else {
        spinner.fail('Wiki update failed');
      }
      printJob(outcome.job);

      if (options.writeReadme) {
        await writeReadmes(outcome, repoPath);
      }
      if (outcome.job.status !== 'COMPLETED') process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

// Search command
program
  .command('search <query>')
  .description('Search the generated wiki')
  .requiredOption('-r, --repo <path|url>', 'Local path or git URL the wiki was generated for')
  .option('-b, --branch <branch>', 'Branch (default: the repository default branch)')
  .option('-s, --semantic', 'Semantic search over chunk embeddings')
  .option('-n, --limit <n>', 'Maximum results', (v) => parseInt(v, 10), 10)
  .action(async (query: string, options: { repo: string; branch?: string; semantic?: boolean; limit: number }) => {
    try {
      const { settings } = await loadSettings();
      const store = await JsonFileStore.open(settings.storePath);
      const repository = await findRepository(store, options.repo);
      const branch = options.branch ?? repository.defaultBranch;

      if (options.semantic) {
        const embedder = createEmbedder(settings);
        const spinner = ora('Embedding query...').start();
        const vector = await embedder.embed(query);
        spinner.stop();

        const results = await store.searchChunks(repository.id, vector, { limit: options.limit, branch });
        if (results.length === 0) {
          console.log(chalk.yellow(`No matches for "${query}"`));
          return;
        }
        for (const { chunk, page, structure, score } of results) {
          const where = chunk.headingPath.join(' > ') || page.title;
          console.log(chalk.cyan(`\n${page.title}`), chalk.gray(`[${structure.scopePath}] ${where}`), chalk.yellow(score.toFixed(3)));
          console.log(chalk.gray(chunk.content.slice(0, 300).trim()));
        }
        return;
      }

      const results = await store.searchPagesByText(repository.id, query, { limit: options.limit, branch });
      if (results.length === 0) {
        console.log(chalk.yellow(`No wiki pages found matching "${query}"`));
        return;
      }
      for (const { page, structure, score } of results) {
        console.log(chalk.cyan(page.title), chalk.gray(`(${page.pageKey}, scope ${structure.scopePath})`), chalk.yellow(String(score)));
        if (page.description) console.log(chalk.gray(`  ${page.description}`));
      }
    } catch (error) {
      fail(error);
    }
  });

// Jobs command
program
  .command('jobs')
  .description('List generation jobs for a repository')
  .requiredOption('-r, --repo <path|url>', 'Local path or git URL')
  .option('--id <jobId>', 'Show one job in detail')
  .action(async (options: { repo: string; id?: string }) => {
    try {
      const { settings } = await loadSettings();
      const store = await JsonFileStore.open(settings.storePath);

      if (options.id) {
        const job = await store.getJob(options.id);
        if (!job) throw new Error(`Job not found: ${options.id}`);
        printJob(job);
        return;
      }

      const repository = await findRepository(store, options.repo);
      const jobs = await store.listJobs(repository.id);
      if (jobs.length === 0) {
        console.log(chalk.yellow('No jobs yet.'));
        return;
      }
      for (const job of jobs) {
        const status = job.status === 'COMPLETED' ? chalk.green(job.status) : job.status === 'FAILED' ? chalk.red(job.status) : chalk.yellow(job.status);
        const score = job.qualityReport ? job.qualityReport.overallScore.toFixed(2) : '-';
        console.log(`${chalk.gray(job.createdAt)} ${job.id} ${job.mode.padEnd(11)} ${status} ${chalk.white(score)}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// Export command
program
  .command('export')
  .description('Write the latest wiki pages as markdown files')
  .requiredOption('-r, --repo <path|url>', 'Local path or git URL')
  .option('-o, --output <dir>', 'Output directory', './wiki')
  .option('-b, --branch <branch>', 'Branch (default: the repository default branch)')
  .action(async (options: { repo: string; output: string; branch?: string }) => {
    try {
      const { settings } = await loadSettings();
      const store = await JsonFileStore.open(settings.storePath);
      const repository = await findRepository(store, options.repo);

      const summary = await exportWiki({
        store,
        repositoryId: repository.id,
        branch: options.branch ?? repository.defaultBranch,
        outputDir: path.resolve(options.output),
      });
      console.log(chalk.green(`✓ Exported ${summary.pages} pages from ${summary.scopes} scope(s) to ${path.resolve(options.output)}`));
    } catch (error) {
      fail(error);
    }
  });

// Serve command - MCP server over stdio
program
  .command('serve')
  .description('Serve the wiki to MCP clients over stdio')
  .requiredOption('-r, --repo <path|url>', 'Local path or git URL')
  .option('-b, --branch <branch>', 'Branch (default: the repository default branch)')
  .option('--no-semantic', 'Disable semantic_search (skips loading the embedding model)')
  .action(async (options: { repo: string; branch?: string; semantic: boolean }) => {
    try {
      const { settings } = await loadSettings();
      const store = await JsonFileStore.open(settings.storePath);
      const repository = await findRepository(store, options.repo);
      const logger = createLogger('mcp', { verbose: settings.verbose });

      const server = new WikiMCPServer({
        store,
        repositoryId: repository.id,
        branch: options.branch ?? repository.defaultBranch,
        embedder: options.semantic
          ? createEmbedder(settings, logger)
          : undefined,
        logger,
      });
      await server.start();
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
