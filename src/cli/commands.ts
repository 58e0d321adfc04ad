/**
 * hubcache command runner
 *
 * Each subcommand maps onto one core operation. The returned number is the
 * process exit code: 0 on success, 1 on any reported failure.
 */

import type { Logger } from 'pino';
import { loadConfig, type RuntimeConfig } from '../config/loader.js';
import { HubEnvironment, detectMode } from '../config/hub-environment.js';
import { isHubCacheError, wrapError } from '../api/errors.js';
import { CacheRoot } from '../core/cache-root.js';
import { StaleArtifactScanner } from '../core/stale-artifact-scanner.js';
import { CleanupEngine } from '../core/cleanup-engine.js';
import { OfflineReadinessChecker } from '../core/offline-readiness.js';
import { BatchIngestionController } from '../core/batch-ingestion.js';
import { readManifest } from '../core/manifest.js';
import { CacheStatusReporter } from '../core/cache-status.js';
import { findLocalModels } from '../core/local-model-finder.js';
import { ensureToken, type SecretPrompt, type TokenSource } from '../core/token-session.js';
import { PythonHubFetcher } from '../bridge/python-hub-fetcher.js';
import { HubIdentityClient } from '../bridge/hub-identity-client.js';
import { createLogger } from '../utils/logger.js';
import type { HubFetcher, HubIdentity, TokenValidation } from '../types/hub.js';
import { parseArgs, type CLIArgs } from './args.js';
import { promptSecret } from './prompts.js';

const RULE = '='.repeat(50);

/**
 * Collaborators the runner builds by default; tests swap them for fakes
 */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  createFetcher?: (environment: HubEnvironment, config: RuntimeConfig) => HubFetcher;
  createIdentity?: (root: CacheRoot, config: RuntimeConfig) => HubIdentity;
  prompt?: SecretPrompt;
}

interface CommandContext {
  args: CLIArgs;
  config: RuntimeConfig;
  env: NodeJS.ProcessEnv;
  root: CacheRoot;
  logger: Logger;
  deps: CliDependencies;
}

export function helpText(): string {
  return `
hubcache - Shared Hugging Face model & dataset cache for offline compute nodes

USAGE:
  hubcache <command> [options]

COMMANDS:
  download-model <repo-id>              Download a model snapshot
    --revision <rev>                    Git revision (default: main)
    --ignore-patterns <p>...            File patterns to skip (e.g. '*.bin' '*.gguf')

  download-dataset <repo-id>            Download a dataset (arrow cache)
    --name <config>                     Configuration / subset name
    --split <split>                     Specific split
    --trust-remote-code                 Allow dataset scripts to run

  download-from-file <manifest>         Batch download models & datasets
    --dry-run                           Only print what would be downloaded

  status                                Show cache usage
  clean                                 Remove stale locks, incomplete downloads,
    --dry-run                           misplaced datasets (or only show them)
  verify <model-or-path>                Check a model is usable offline
    --dataset <repo-id>                 Also check a dataset
  list-local <directory>                Find local models (safetensors)
  login                                 Check / set the hub token
  setup                                 Print shell exports for the cache
    --offline                           Include offline-mode flags

OPTIONS:
  --hf-home <path>                      Cache root (default: $HF_HOME or template)
  --config <path>                       Configuration file
  --verbose                             Debug logging on stderr
  --help                                Show this help message

MANIFEST FORMAT:
  # comment
  Qwen/Qwen2.5-0.5B-Instruct
  dataset:cais/mmlu,all
  dataset:trl-lib/Capybara,,train
`;
}

function createFetcher(ctx: CommandContext, token?: string): HubFetcher {
  const environment = new HubEnvironment(ctx.root.layout, 'online', token);
  if (ctx.deps.createFetcher) {
    return ctx.deps.createFetcher(environment, ctx.config);
  }
  return new PythonHubFetcher({
    environment,
    pythonPath: ctx.config.fetch.python_path,
    logger: ctx.logger.child({ component: 'PythonHubFetcher' }),
  });
}

function createIdentity(ctx: CommandContext): HubIdentity {
  if (ctx.deps.createIdentity) {
    return ctx.deps.createIdentity(ctx.root, ctx.config);
  }
  return new HubIdentityClient({
    tokenPath: ctx.root.tokenPath,
    endpoint: ctx.config.fetch.endpoint,
    env: ctx.env,
    logger: ctx.logger.child({ component: 'HubIdentityClient' }),
  });
}

function createScanner(ctx: CommandContext): StaleArtifactScanner {
  return new StaleArtifactScanner(
    ctx.root.layout,
    {
      lockSuffix: ctx.config.scan.lock_suffix,
      incompleteSuffix: ctx.config.scan.incomplete_suffix,
    },
    ctx.logger.child({ component: 'StaleArtifactScanner' })
  );
}

function requirePositional(ctx: CommandContext, label: string): string | null {
  const value = ctx.args._[1];
  if (!value) {
    console.error(`❌ Error: missing <${label}>\n`);
    console.log(helpText());
    return null;
  }
  return value;
}

async function downloadModel(ctx: CommandContext): Promise<number> {
  const modelId = requirePositional(ctx, 'repo-id');
  if (!modelId) return 1;

  const revision = ctx.args.revision ?? ctx.config.fetch.default_revision;
  const ignorePatterns = ctx.args['ignore-patterns'];
  const token = await createIdentity(ctx).getToken();

  console.log(`📥 Downloading model: ${modelId}  (revision=${revision})`);
  if (ignorePatterns && ignorePatterns.length > 0) {
    console.log(`   Ignoring: ${ignorePatterns.join(', ')}`);
  }

  try {
    const localPath = await createFetcher(ctx, token).fetchModel({
      id: modelId,
      revision,
      ignorePatterns,
      token,
    });
    console.log(`✅ Model cached at ${localPath}`);
    return 0;
  } catch (error) {
    console.error(`❌ Error downloading model: ${wrapError(error).message}`);
    return 1;
  }
}

async function downloadDataset(ctx: CommandContext): Promise<number> {
  const datasetId = requirePositional(ctx, 'repo-id');
  if (!datasetId) return 1;

  const token = await createIdentity(ctx).getToken();

  console.log(`📥 Downloading dataset: ${datasetId}`);
  if (ctx.args.name) console.log(`   Config: ${ctx.args.name}`);
  if (ctx.args.split) console.log(`   Split : ${ctx.args.split}`);

  try {
    const handle = await createFetcher(ctx, token).fetchDataset({
      id: datasetId,
      config: ctx.args.name,
      split: ctx.args.split,
      trustRemoteCode: ctx.args['trust-remote-code'] ?? false,
      token,
    });
    const splits = Object.entries(handle.splits);
    if (ctx.args.split) {
      console.log(`✅ Downloaded ${handle.splits[ctx.args.split] ?? 0} examples`);
    } else {
      console.log(`✅ Downloaded splits: ${splits.map(([name]) => name).join(', ')}`);
      for (const [name, count] of splits) {
        console.log(`   - ${name}: ${count} examples`);
      }
    }
    return 0;
  } catch (error) {
    console.error(`❌ Error downloading dataset: ${wrapError(error).message}`);
    return 1;
  }
}

async function downloadFromFile(ctx: CommandContext): Promise<number> {
  const manifestPath = requirePositional(ctx, 'manifest');
  if (!manifestPath) return 1;

  if (ctx.args['dry-run']) {
    const controller = new BatchIngestionController({ fetcher: createFetcher(ctx) });
    const entries = await controller.plan(manifestPath);
    console.log('🔍 Dry run – would download:');
    for (const entry of entries) {
      if (entry.kind === 'dataset') {
        const fields = [entry.name, entry.config ?? '', entry.split ?? ''].join(',').replace(/,+$/, '');
        console.log(`   📂 dataset: ${fields}`);
      } else {
        console.log(`   📦 model:   ${entry.name}`);
      }
    }
    return 0;
  }

  // a missing manifest fails before any token prompt or network call
  const entries = await readManifest(manifestPath);

  const session = await ensureToken(createIdentity(ctx), ctx.deps.prompt ?? promptSecret, ctx.logger);
  reportTokenSession(session.source, session.validation);

  const controller = new BatchIngestionController({
    fetcher: createFetcher(ctx, session.token),
    token: session.token,
    revision: ctx.config.fetch.default_revision,
    logger: ctx.logger.child({ component: 'BatchIngestionController' }),
  });

  controller.on('entry:start', (entry) => {
    console.log(`📥 ${entry.kind === 'dataset' ? 'Dataset' : 'Model'}: ${entry.name}`);
  });
  controller.on('entry:success', (_entry, detail) => {
    console.log(`✅ ${detail}`);
  });
  controller.on('entry:failure', (entry, error) => {
    console.error(`❌ ${entry.name} (line ${entry.line}): ${error.message}`);
  });

  const tally = await controller.ingestEntries(entries);

  console.log(`\n${RULE}`);
  console.log(`📋 Batch complete: ${tally.successes} succeeded, ${tally.failures} failed`);
  return tally.failures === 0 ? 0 : 1;
}

async function status(ctx: CommandContext): Promise<number> {
  const reporter = new CacheStatusReporter(ctx.root.layout, createScanner(ctx), ctx.logger);
  const report = await reporter.collect();

  console.log('📊 Cache Status');
  console.log(`   HF_HOME  : ${report.root}`);
  console.log(`   Models   : ${report.hubSize}`);
  console.log(`   Datasets : ${report.datasetsSize}`);
  console.log(`   Total    : ${report.totalSize}`);

  if (report.models.length > 0) {
    console.log(`\n   📦 Cached models (${report.models.length}):`);
    for (const model of report.models) {
      console.log(`     • ${model.id}  (${model.size})`);
    }
  }

  if (report.datasets.length > 0) {
    console.log(`\n   📂 Cached datasets (${report.datasets.length}):`);
    for (const dataset of report.datasets) {
      console.log(`     • ${dataset.id}  (${dataset.size})`);
    }
  }

  if (report.lockFiles > 0) {
    console.log(`\n   ⚠️  ${report.lockFiles} stale lock file(s) found`);
    console.log('      Run: hubcache clean');
  }

  return 0;
}

async function clean(ctx: CommandContext): Promise<number> {
  const dryRun = ctx.args['dry-run'] ?? false;
  const engine = new CleanupEngine(createScanner(ctx), ctx.logger.child({ component: 'CleanupEngine' }));

  engine.on('action', (action) => {
    console.log(`   ${action.performed ? '' : '[DRY RUN] '}${action.operation} ${action.artifact.path}`);
  });

  const report = await engine.clean({ dryRun });

  if (report.count === 0) {
    console.log('✅ Cache is clean – nothing to remove.');
  } else {
    console.log(`\n${RULE}`);
    console.log(`🧹 ${report.count} item(s) ${dryRun ? 'would be' : 'were'} cleaned.`);
  }
  return 0;
}

async function verify(ctx: CommandContext): Promise<number> {
  const model = requirePositional(ctx, 'model-or-path');
  if (!model) return 1;

  const checker = new OfflineReadinessChecker(
    ctx.root.layout,
    { weightExtensions: ctx.config.readiness.weight_extensions },
    ctx.logger
  );
  const report = await checker.verify(model, ctx.args.dataset);

  for (const check of report.checks) {
    const icon = check.ready ? '✅' : check.status === 'not-cached' ? '❌' : '⚠️ ';
    console.log(`${icon} ${check.message}`);
    if (check.remediation) {
      console.log(`   Run:  ${check.remediation}`);
    }
  }

  return report.ready ? 0 : 1;
}

async function listLocal(ctx: CommandContext): Promise<number> {
  const directory = requirePositional(ctx, 'directory');
  if (!directory) return 1;

  const found = await findLocalModels(directory);
  if (found.length === 0) {
    console.log(`   No safetensors models found under ${directory}`);
  } else {
    console.log(`🔍 Found ${found.length} model(s) under ${directory}:`);
    for (const modelDir of found) {
      console.log(`   • ${modelDir}`);
    }
  }
  return 0;
}

function reportTokenSession(source: TokenSource, validation: TokenValidation | undefined): void {
  if (source === 'none') {
    console.log('   ⏭️  Skipped – continuing without token (public models only).');
    return;
  }
  if (validation?.valid) {
    console.log('✅ Token validated successfully!');
    console.log(`   Logged in as : ${validation.user.name}`);
    console.log(`   Token type   : ${validation.user.type ?? 'unknown'}`);
  } else if (validation) {
    console.log('❌ Token validation failed.');
    console.log(`   Error: ${validation.error.message}`);
    console.log('   Continuing anyway – some downloads may fail for gated models.');
  }
}

async function login(ctx: CommandContext): Promise<number> {
  const session = await ensureToken(createIdentity(ctx), ctx.deps.prompt ?? promptSecret, ctx.logger);
  reportTokenSession(session.source, session.validation);
  if (session.source === 'prompt') {
    console.log('   Token will be passed as HF_TOKEN to download helpers.');
  }
  return session.token ? 0 : 1;
}

async function setup(ctx: CommandContext): Promise<number> {
  const mode = ctx.args.offline ? 'offline' : detectMode(ctx.env);
  const environment = new HubEnvironment(ctx.root.layout, mode);
  const variables = environment.variables();

  console.log(`✅ Hugging Face environment  [${mode.toUpperCase()}]`);
  console.log(`   HF_HOME           = ${variables.HF_HOME}`);
  console.log(`   HF_HUB_CACHE      = ${variables.HF_HUB_CACHE}`);
  console.log(`   HF_DATASETS_CACHE = ${variables.HF_DATASETS_CACHE}`);
  if (environment.isOffline()) {
    console.log('   HF_HUB_OFFLINE    = 1');
  }
  console.log('\n# Copy-paste or eval these in your shell:');
  for (const line of environment.toShellExports()) {
    console.log(line);
  }
  return 0;
}

const COMMANDS: Record<string, (ctx: CommandContext) => Promise<number>> = {
  'download-model': downloadModel,
  'download-dataset': downloadDataset,
  'download-from-file': downloadFromFile,
  status,
  clean,
  verify,
  'list-local': listLocal,
  login,
  setup,
};

/**
 * Parse argv, run one command and return the exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;

  let args: CLIArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(`❌ Error: ${wrapError(error).message}\n`);
    console.log(helpText());
    return 1;
  }

  const command = args._[0];
  if (args.help) {
    console.log(helpText());
    return 0;
  }

  const handler = command ? COMMANDS[command] : undefined;
  if (!handler) {
    console.error(command ? `❌ Error: Unknown command: ${command}\n` : '❌ Error: No command specified\n');
    console.log(helpText());
    return 1;
  }

  try {
    const config = loadConfig(args.config, env);
    const logger = deps.logger ?? createLogger(args.verbose ? 'debug' : config.logging.level);
    const root = await CacheRoot.open(
      { explicitPath: args['hf-home'], env, template: config.cache.root_template },
      logger
    );

    return await handler({ args, config, env, root, logger, deps });
  } catch (error) {
    const err = wrapError(error);
    console.error(`\n❌ Error: ${err.message}`);
    if (isHubCacheError(error)) {
      console.error(`   Code: ${err.code}`);
    }
    if (args.verbose && err.stack) {
      console.error('\nStack trace:');
      console.error(err.stack);
    }
    return 1;
  }
}
