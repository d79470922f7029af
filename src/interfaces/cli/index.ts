#!/usr/bin/env node

/**
 * nextstep CLI Entry Point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigManager, type RuntimeConfig } from '../../core/config.js';
import { TaskAgent, type Task } from '../../core/agent.js';
import { HttpDomainClient } from '../../api/client.js';
import { createOpenAICompatibleModel } from '../../models/openai-compatible.js';
import { createKnowledgeStore } from '../../knowledge/factory.js';
import type { KnowledgeStore } from '../../knowledge/store.js';
import { HttpBenchmarkHarness } from '../../harness/harness.js';
import { runSession, runSingleTask, type TaskRunner } from '../../harness/session-runner.js';
import { runSetupWizard, updateConfiguration } from './setup-wizard.js';
import { logger, LogLevel } from '../../utils/logger.js';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  // Compiled output sits one level deeper (dist/src/...) than the sources.
  for (const relative of ['../../../package.json', '../../../../package.json']) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(join(__dirname, relative), 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch (error) {
      logger.debug(`No package.json at ${relative}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return '0.0.0';
}

interface RunOptions {
  debug?: boolean;
  maxSteps?: number;
}

function prepare(options: RunOptions): RuntimeConfig {
  const configManager = getConfigManager();
  const config = configManager.validateConfig();

  if (options.debug || config.debug) {
    logger.setLogLevel(LogLevel.DEBUG);
  }
  if (options.maxSteps !== undefined) {
    config.agent.maxSteps = options.maxSteps;
  }
  return config;
}

function createTaskRunner(config: RuntimeConfig, store: KnowledgeStore): TaskRunner {
  const model = createOpenAICompatibleModel({
    endpoint: config.model.endpoint,
    apiKey: config.model.apiKey,
    model: config.model.model,
    temperature: config.model.temperature,
    maxTokens: config.model.maxTokens,
  });

  return async (task: Task) => {
    const client = new HttpDomainClient({
      baseUrl: config.benchmark.baseUrl,
      taskId: task.taskId,
      apiKey: config.benchmark.apiKey,
    });
    const agent = new TaskAgent({
      model,
      client,
      store,
      maxSteps: config.agent.maxSteps,
      initialPageSize: config.agent.initialPageSize,
    });
    return agent.run(task);
  };
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

const program = new Command();

program
  .name('nextstep')
  .description('Autonomous task agent for enterprise benchmark sessions')
  .version(readVersion());

program
  .command('setup')
  .description('Run the setup wizard')
  .action(async () => {
    try {
      await runSetupWizard();
    } catch (error) {
      logger.error('Setup failed', error);
      process.exit(1);
    }
  });

program
  .command('config')
  .description('Update configuration')
  .action(async () => {
    try {
      const configManager = getConfigManager();
      if (!configManager.isConfigured()) {
        console.log(chalk.yellow('nextstep is not configured. Running setup wizard...\n'));
        await runSetupWizard();
      } else {
        await updateConfiguration();
      }
    } catch (error) {
      logger.error('Configuration update failed', error);
      process.exit(1);
    }
  });

program
  .command('task')
  .description('Start a single task by spec id and run the agent on it')
  .argument('<specId>', 'Spec id of the task to start')
  .option('--debug', 'Enable debug mode')
  .option('--max-steps <number>', 'Maximum agent steps', parsePositiveInt)
  .action(async (specId: string, options: RunOptions) => {
    try {
      const config = prepare(options);
      const store = await createKnowledgeStore(config.cache);
      const harness = new HttpBenchmarkHarness({
        baseUrl: config.benchmark.baseUrl,
        apiKey: config.benchmark.apiKey,
      });

      const result = await runSingleTask(harness, config.benchmark.benchmark, specId, createTaskRunner(config, store));
      logger.info(`Task ${result.taskId} finished: ${result.status}`);
    } catch (error) {
      logger.error('Task failed', error);
      process.exit(1);
    }
  });

program
  .command('session')
  .description('Run a full benchmark session and submit it')
  .option('--debug', 'Enable debug mode')
  .option('--max-steps <number>', 'Maximum agent steps', parsePositiveInt)
  .option('-n, --name <name>', 'Session name', 'NextStep agent')
  .action(async (options: RunOptions & { name: string }) => {
    try {
      const config = prepare(options);
      const store = await createKnowledgeStore(config.cache);
      const harness = new HttpBenchmarkHarness({
        baseUrl: config.benchmark.baseUrl,
        apiKey: config.benchmark.apiKey,
      });

      const summary = await runSession(harness, createTaskRunner(config, store), {
        benchmark: config.benchmark.benchmark,
        workspace: config.benchmark.workspace,
        name: `${options.name} (${config.model.model})`,
        architecture: 'NextStep agent with structured outputs',
      });

      const failed = summary.results.filter((r) => r.status === 'failed');
      if (failed.length > 0) {
        logger.warn(`${failed.length} task(s) failed: ${failed.map((r) => r.taskId).join(', ')}`);
      }
    } catch (error) {
      logger.error('Session failed', error);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exit(1);
});
