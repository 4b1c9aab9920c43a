import { writeFile } from 'node:fs/promises';
import { loadConfig, createBackendClient } from '../src/config.js';
import { configureLogger, Logger } from '../src/logger.js';
import { describeError } from '../src/helpers.js';
import { AgentFactory } from '../src/agents/factory.js';
import { createSampleCases, loadCasesFromFile } from '../src/evaluation/cases.js';
import { Evaluator } from '../src/evaluation/evaluator.js';
import { METRIC_NAMES, type Metrics } from '../src/evaluation/metrics.js';
import { EpisodeTrainer } from '../src/training/trainer.js';

// Usage: evaluate [--cases <file>] [--episodes <n>] [--checkpoint-dir <dir>] [--output <file>]
// Without --episodes the cases are evaluated once; with it, the trainer runs and saves a checkpoint.

type CliOptions = {
  casesPath?: string;
  episodes?: number;
  checkpointDir?: string;
  outputPath?: string;
};

const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === '--cases' && value) {
      options.casesPath = value;
      i += 1;
    } else if (arg === '--episodes' && value) {
      const episodes = Number.parseInt(value, 10);
      if (!Number.isInteger(episodes) || episodes < 1) {
        throw new Error(`--episodes expects a positive integer, got ${value}`);
      }
      options.episodes = episodes;
      i += 1;
    } else if (arg === '--checkpoint-dir' && value) {
      options.checkpointDir = value;
      i += 1;
    } else if (arg === '--output' && value) {
      options.outputPath = value;
      i += 1;
    } else {
      throw new Error(`Unknown or incomplete argument: ${arg ?? ''}`);
    }
  }
  return options;
};

const printMetrics = (metrics: Metrics): void => {
  for (const name of METRIC_NAMES) {
    console.log(`  ${name}: ${metrics[name].toFixed(3)}`);
  }
};

const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  configureLogger({ consoleLevel: config.logLevel });

  const factory = new AgentFactory(createBackendClient(config));
  const agent = factory.create({
    model: config.model,
    temperature: config.temperature,
    maxIterations: config.maxIterations,
    statefulness: config.statefulness,
  });
  const cases = options.casesPath ? await loadCasesFromFile(options.casesPath) : createSampleCases();

  if (options.episodes !== undefined) {
    const trainer = new EpisodeTrainer(agent, {
      checkpointDir: options.checkpointDir ?? config.checkpointDir,
    });
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const run = await trainer.train(cases, { numEpisodes: options.episodes, signal: controller.signal });
    const last = run.history[run.history.length - 1];
    if (last) {
      console.log(`Final average reward: ${last.avgReward.toFixed(3)}`);
      await trainer.saveCheckpoint(last.episode + 1);
    }
    if (run.cancelled) {
      process.exitCode = 130;
    }
    return;
  }

  const evaluator = new Evaluator(agent);
  const result = await evaluator.evaluateBatch(cases, {
    onProgress: (completed, total) => Logger.info('cli', `Case ${completed}/${total} done`),
  });

  console.log(`Number of test cases: ${result.numTestCases}`);
  console.log('Aggregate metrics:');
  printMetrics(result.aggregateMetrics);

  if (options.outputPath) {
    await writeFile(options.outputPath, `${JSON.stringify(result, null, 2)}\n`, 'utf8');
    console.log(`Results saved to ${options.outputPath}`);
  }
};

main().catch((error: unknown) => {
  Logger.error('cli', describeError(error));
  process.exitCode = 1;
});
