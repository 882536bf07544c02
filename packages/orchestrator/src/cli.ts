import chalk from 'chalk';
import Table from 'cli-table3';
import {
  PipelineCancelledError,
  TOPIC_STATUSES,
  createLogger,
  errorMessage,
  loadConfig,
  loadDotenv,
  type Config,
  type Logger,
  type TopicStatus,
} from '@factreel/shared';
import { createPipeline } from './pipeline.js';
import { createDashboard, type DashboardDeps } from './dashboard.js';
import { BatchScheduler } from './scheduler.js';
import type { Orchestrator } from './orchestrator.js';

const print = {
  header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
  success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
  info: (text: string) => console.log(chalk.blue(`  ℹ ${text}`)),
  warn: (text: string) => console.log(chalk.yellow(`  ⚠ ${text}`)),
  error: (text: string) => console.log(chalk.red(`  ✗ ${text}`)),
  dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
};

/** The slice of a pipeline the commands use */
export interface CliPipeline {
  orchestrator: Pick<Orchestrator, 'run'>;
  queue: DashboardDeps['queue'];
  store: DashboardDeps['store'];
  close(): Promise<void>;
}

export interface CliDeps {
  /** Read instead of `.env` plus process.env */
  env?: Record<string, string | undefined>;
  logger?: Logger;
  createPipeline?: (config: Config, logger: Logger) => CliPipeline;
}

/** Runs one command and resolves to the process exit code. Item failures
 * inside a batch still exit 0; a failed or cancelled batch exits 1. */
export async function main(args: string[], deps: CliDeps = {}): Promise<number> {
  const command = args[0] === '--once' ? 'run' : args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  let env = deps.env;
  if (!env) {
    loadDotenv();
    env = process.env;
  }
  const config = loadConfig(env);
  const logger = deps.logger ?? createLogger('factreel', config.logLevel);
  const pipeline = (deps.createPipeline ?? createPipeline)(config, logger);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    print.warn(`${signal} received, stopping at the next poll`);
    controller.abort(new Error(signal));
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    switch (command) {
      case 'run': {
        print.header('Pipeline Batch');
        const result = await pipeline.orchestrator.run({
          channelId: getFlag(args, '--channel'),
          signal: controller.signal,
        });

        const table = new Table({
          head: [chalk.cyan('Candidates'), chalk.cyan('Approved'), chalk.cyan('Skipped'), chalk.cyan('Succeeded'), chalk.cyan('Failed')],
        });
        table.push([
          result.candidates.length,
          result.approved.length,
          result.skipped.length,
          chalk.green(result.succeeded.length),
          result.itemsFailed > 0 ? chalk.red(result.itemsFailed) : '0',
        ]);
        console.log(table.toString());

        for (const item of result.succeeded) {
          print.success(`${item.topicTitle} ${chalk.dim(`(${item.videoId})`)}`);
        }
        print.dim(`Finished in ${(result.durationMs / 1000).toFixed(1)}s`);
        return 0;
      }

      case 'schedule': {
        print.header('Recurring Batches');
        const scheduler = new BatchScheduler(
          (signal) => pipeline.orchestrator.run({ signal }),
          { redisUrl: config.redisUrl, pattern: config.pipelineSchedule, timezone: config.pipelineTimezone },
          logger,
        );
        await scheduler.start();
        print.success(`Scheduled "${config.pipelineSchedule}" (${config.pipelineTimezone})`);
        print.dim('Press Ctrl+C to stop');

        await new Promise<void>((resolve) => {
          controller.signal.addEventListener('abort', () => resolve(), { once: true });
        });
        await scheduler.stop();
        return 0;
      }

      case 'topics': {
        const status = parseTopicStatus(getFlag(args, '--status') ?? 'pending');
        const channelId = getFlag(args, '--channel') ?? (await pipeline.store.fetchChannelId());
        print.header(`Topics (${status})`);
        const topics = await pipeline.store.listTopics(channelId, status);

        if (topics.length === 0) {
          print.info(`No ${status} topics`);
          return 0;
        }

        const table = new Table({
          head: [chalk.cyan('ID'), chalk.cyan('Title'), chalk.cyan('Similarity'), chalk.cyan('Created')],
          colWidths: [38, 40, 12, 22],
        });
        for (const topic of topics) {
          table.push([
            topic.id,
            topic.title.slice(0, 38),
            topic.similarityScore === null ? '-' : topic.similarityScore.toFixed(2),
            topic.createdAt.toISOString().slice(0, 16).replace('T', ' '),
          ]);
        }
        console.log(table.toString());
        return 0;
      }

      case 'approve': {
        const topicId = requireArg(args[1], 'approve <topicId>');
        await pipeline.store.setTopicStatus(topicId, 'approved');
        print.success(`Topic ${chalk.bold(topicId)} approved`);
        return 0;
      }

      case 'reject': {
        const topicId = requireArg(args[1], 'reject <topicId> [reason]');
        const reason = args.slice(2).join(' ') || 'No reason provided';
        await pipeline.store.setTopicStatus(topicId, 'rejected', reason);
        print.success(`Topic ${chalk.bold(topicId)} rejected`);
        print.dim(`Reason: ${reason}`);
        return 0;
      }

      case 'runs': {
        print.header('Recent Batches');
        const limit = parseInt(getFlag(args, '--limit') ?? '10', 10) || 10;
        const runs = await pipeline.store.listRecentRuns(limit);

        if (runs.length === 0) {
          print.info('No batches recorded yet');
          return 0;
        }

        const table = new Table({
          head: [chalk.cyan('Started'), chalk.cyan('Status'), chalk.cyan('Cand.'), chalk.cyan('OK'), chalk.cyan('Fail'), chalk.cyan('Error')],
          colWidths: [22, 10, 8, 6, 6, 40],
        });
        for (const run of runs) {
          table.push([
            run.createdAt.toISOString().slice(0, 16).replace('T', ' '),
            run.status === 'success' ? chalk.green(run.status) : chalk.red(run.status),
            run.candidatesProcessed,
            run.itemsSucceeded,
            run.itemsFailed,
            (run.errorMessage ?? '').slice(0, 38),
          ]);
        }
        console.log(table.toString());
        return 0;
      }

      case 'stats': {
        print.header('Queue Health');
        const health = await pipeline.queue.getHealth();
        const table = new Table({
          head: [chalk.cyan('Queue'), chalk.cyan('Waiting'), chalk.cyan('Active'), chalk.cyan('Completed'), chalk.cyan('Failed'), chalk.cyan('Delayed')],
        });
        for (const [name, counts] of Object.entries(health)) {
          table.push([name, counts.waiting, counts.active, counts.completed, counts.failed, counts.delayed]);
        }
        console.log(table.toString());
        return 0;
      }

      case 'dashboard': {
        const port = parseInt(getFlag(args, '--port') ?? String(config.dashboardPort), 10);
        const server = createDashboard({ queue: pipeline.queue, store: pipeline.store, logger }, port);
        print.success(`Dashboard on http://localhost:${port}`);

        await new Promise<void>((resolve) => {
          controller.signal.addEventListener('abort', () => resolve(), { once: true });
        });
        await new Promise<void>((resolve) => server.close(() => resolve()));
        return 0;
      }

      default:
        print.error(`Unknown command: ${command}`);
        printHelp();
        return 1;
    }
  } catch (err) {
    if (err instanceof PipelineCancelledError) {
      print.warn('Batch cancelled; the run was recorded as failed');
    } else {
      print.error(`Error: ${errorMessage(err)}`);
    }
    return 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await pipeline.close();
  }
}

function printHelp() {
  console.log(`
  factreel: short-form fact video pipeline orchestrator

  Usage:
    npm run orchestrate <command> [options]

  Commands:
    run (--once)               Run one batch now
      --channel <id>           Channel to mine for (default: first configured)
    schedule                   Run batches on PIPELINE_SCHEDULE until stopped

    topics                     List topics
      --status <status>        pending, approved, rejected, published
    approve <topicId>          Approve a mined topic
    reject <topicId> [reason]  Reject a mined topic

    runs                       Show recent batches
      --limit <n>              Rows to show (default: 10)
    stats                      Show queue health
    dashboard                  Start the dashboard API server
      --port <n>               Port (default: DASHBOARD_PORT)
  `);
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function requireArg(value: string | undefined, usage: string): string {
  if (!value) throw new Error(`Usage: ${usage}`);
  return value;
}

function parseTopicStatus(value: string): TopicStatus {
  const status = TOPIC_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown topic status "${value}"; expected one of ${TOPIC_STATUSES.join(', ')}`);
  return status;
}
