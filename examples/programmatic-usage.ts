/**
 * Example: Programmatic Usage
 *
 * Runs the agent on one benchmark task from your own TypeScript/Node.js code.
 */

import {
  TaskAgent,
  HttpDomainClient,
  HttpBenchmarkHarness,
  createOpenAICompatibleModel,
  createKnowledgeStore,
  KnowledgeStoreType,
  runSingleTask,
  logger,
  LogLevel,
} from '../src/index.js';

async function main() {
  // Enable debug logging
  logger.setLogLevel(LogLevel.DEBUG);

  try {
    // 1. Create the model
    const model = createOpenAICompatibleModel({
      endpoint: process.env.NEXTSTEP_MODEL_ENDPOINT || 'http://localhost:11434/v1/chat/completions',
      apiKey: process.env.NEXTSTEP_MODEL_API_KEY || 'your-api-key-here',
      model: process.env.NEXTSTEP_MODEL || 'gpt-4o',
    });

    // 2. Knowledge cache shared by every task in this process
    const store = await createKnowledgeStore({ provider: KnowledgeStoreType.MEMORY });

    // 3. Benchmark harness
    const baseUrl = process.env.NEXTSTEP_BENCHMARK_URL || 'http://localhost:8080';
    const apiKey = process.env.NEXTSTEP_BENCHMARK_API_KEY;
    const harness = new HttpBenchmarkHarness({ baseUrl, apiKey });

    // 4. Start a task and run the agent on it
    const result = await runSingleTask(harness, 'erc3-test', process.argv[2] || 'demo', async (task) => {
      const agent = new TaskAgent({
        model,
        client: new HttpDomainClient({ baseUrl, taskId: task.taskId, apiKey }),
        store,
        maxSteps: 20,
      });
      return agent.run(task);
    });

    console.log('\nResult:', result.status);
    if (result.score !== undefined) {
      console.log('Score:', result.score);
    }
  } catch (error) {
    logger.error('Error', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error', error);
  process.exit(1);
});
