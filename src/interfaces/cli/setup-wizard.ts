/**
 * Setup Wizard for first-time configuration
 */

import inquirer from 'inquirer';
import { getConfigManager } from '../../core/config.js';
import { KnowledgeStoreType } from '../../knowledge/factory.js';
import { logger } from '../../utils/logger.js';
import chalk from 'chalk';

function validateUrl(input: string): boolean | string {
  try {
    new URL(input);
    return true;
  } catch {
    return 'Please enter a valid URL';
  }
}

interface ModelAnswers {
  endpoint: string;
  apiKey: string;
  model: string;
}

interface BenchmarkAnswers {
  baseUrl: string;
  apiKey: string;
  benchmark: string;
  workspace: string;
}

async function promptModel(current?: Partial<ModelAnswers>): Promise<void> {
  const answers = await inquirer.prompt<ModelAnswers>([
    {
      type: 'input',
      name: 'endpoint',
      message: 'Chat completions endpoint URL:',
      default: current?.endpoint ?? 'https://api.openai.com/v1/chat/completions',
      validate: validateUrl,
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'API Key:',
      default: current?.apiKey,
      validate: (input: string) => input.length > 0 || 'API key is required',
    },
    {
      type: 'input',
      name: 'model',
      message: 'Model name:',
      default: current?.model ?? 'gpt-4o',
    },
  ]);

  getConfigManager().setModel(answers);
}

async function promptBenchmark(current?: Partial<BenchmarkAnswers>): Promise<void> {
  const answers = await inquirer.prompt<BenchmarkAnswers>([
    {
      type: 'input',
      name: 'baseUrl',
      message: 'Benchmark API base URL:',
      default: current?.baseUrl ?? 'http://localhost:8080',
      validate: validateUrl,
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'Benchmark API key (leave empty if none):',
      default: current?.apiKey,
    },
    {
      type: 'input',
      name: 'benchmark',
      message: 'Benchmark id:',
      default: current?.benchmark ?? 'erc3-test',
    },
    {
      type: 'input',
      name: 'workspace',
      message: 'Workspace:',
      default: current?.workspace ?? 'my',
    },
  ]);

  getConfigManager().setBenchmark({
    ...answers,
    apiKey: answers.apiKey || undefined,
  });
}

export async function runSetupWizard(): Promise<void> {
  const configManager = getConfigManager();

  console.log(chalk.bold.cyan('\n🤖 Welcome to the nextstep setup wizard\n'));
  console.log('This wizard will help you configure the agent for the first time.\n');

  console.log(chalk.bold('Model Configuration'));
  console.log(chalk.gray('Any endpoint that supports structured JSON output.\n'));
  await promptModel();
  logger.success('Model configured');

  console.log(chalk.bold('\nBenchmark Configuration'));
  console.log(chalk.gray('Where sessions and tasks are started and graded.\n'));
  await promptBenchmark();
  logger.success('Benchmark configured');

  const { provider, enableDebug } = await inquirer.prompt<{ provider: KnowledgeStoreType; enableDebug: boolean }>([
    {
      type: 'list',
      name: 'provider',
      message: 'Where should distilled knowledge be cached?',
      choices: [
        { name: 'Local directory', value: KnowledgeStoreType.LOCAL },
        { name: 'In memory (per process)', value: KnowledgeStoreType.MEMORY },
      ],
      default: KnowledgeStoreType.LOCAL,
    },
    {
      type: 'confirm',
      name: 'enableDebug',
      message: 'Enable debug mode?',
      default: false,
    },
  ]);

  configManager.setCache({ provider });
  configManager.setDebug(enableDebug);

  console.log(chalk.bold.green('\n✓ Setup complete!\n'));
  console.log(`Configuration saved to: ${chalk.cyan(configManager.getConfigPath())}`);
  console.log('\nYou can now run:', chalk.cyan('nextstep session'));
  console.log('');
}

/**
 * Update existing configuration interactively
 */
export async function updateConfiguration(): Promise<void> {
  console.log(chalk.bold.cyan('\n🔧 Update Configuration\n'));

  const { choice } = await inquirer.prompt<{ choice: string }>([
    {
      type: 'list',
      name: 'choice',
      message: 'What would you like to update?',
      choices: [
        { name: 'Model', value: 'model' },
        { name: 'Benchmark', value: 'benchmark' },
        { name: 'Step Budget', value: 'steps' },
        { name: 'Debug Mode', value: 'debug' },
        { name: 'View Configuration', value: 'view' },
        { name: 'Reset All', value: 'reset' },
        { name: 'Cancel', value: 'cancel' },
      ],
    },
  ]);

  switch (choice) {
    case 'model':
      await promptModel(getConfigManager().getModel());
      logger.success('Model updated');
      break;
    case 'benchmark':
      await promptBenchmark(getConfigManager().getBenchmark());
      logger.success('Benchmark updated');
      break;
    case 'steps':
      await updateStepBudget();
      break;
    case 'debug':
      await toggleDebugMode();
      break;
    case 'view':
      viewConfiguration();
      break;
    case 'reset':
      await resetConfiguration();
      break;
    case 'cancel':
      console.log('Cancelled');
      break;
  }
}

async function updateStepBudget() {
  const configManager = getConfigManager();
  const current = configManager.getConfig().agent;

  const { maxSteps } = await inquirer.prompt<{ maxSteps: number }>([
    {
      type: 'number',
      name: 'maxSteps',
      message: 'Maximum steps per task:',
      default: current?.maxSteps ?? 20,
      validate: (input: number) => (Number.isInteger(input) && input > 0) || 'Enter a positive integer',
    },
  ]);

  configManager.setAgentSettings({ ...current, maxSteps });
  logger.success(`Step budget set to ${maxSteps}`);
}

async function toggleDebugMode() {
  const configManager = getConfigManager();

  const { enabled } = await inquirer.prompt<{ enabled: boolean }>([
    {
      type: 'confirm',
      name: 'enabled',
      message: 'Enable debug mode?',
      default: configManager.isDebug(),
    },
  ]);

  configManager.setDebug(enabled);
  logger.success(`Debug mode ${enabled ? 'enabled' : 'disabled'}`);
}

function viewConfiguration() {
  const config = getConfigManager().getConfig();
  const masked = {
    ...config,
    model: config.model ? { ...config.model, apiKey: '********' } : undefined,
    benchmark: config.benchmark?.apiKey ? { ...config.benchmark, apiKey: '********' } : config.benchmark,
  };
  console.log('\nCurrent Configuration:');
  console.log(JSON.stringify(masked, null, 2));
}

async function resetConfiguration() {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: chalk.red('Are you sure you want to reset all configuration?'),
      default: false,
    },
  ]);

  if (confirm) {
    getConfigManager().reset();
    logger.success('Configuration reset');
  }
}
