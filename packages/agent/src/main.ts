#!/usr/bin/env node
import { readFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import type { AppError } from '../../shared/src';
import { configureLogging, getLogDirectory, logger } from './logger';
import { startAgent, createStore } from './services/agent';
import { loadConfig, type LoadedConfig } from './services/config';
import { parseMetadata } from './services/metadata';
import { Publisher } from './services/publisher';

function fail(error: AppError): never {
  logger.fatal({ code: error.code, details: error.details }, error.message);
  process.exit(1);
}

function loadOrExit(configPath?: string): LoadedConfig {
  const loaded = loadConfig(configPath);
  if (loaded.isErr()) fail(loaded.error);
  const { settings } = loaded.value;
  configureLogging({
    directory: settings.paths.logDir,
    level: settings.logging.level,
    retentionDays: settings.logging.retentionDays
  });
  logger.info({ file: loaded.value.file, logDir: getLogDirectory() }, 'Config loaded');
  return loaded.value;
}

function parseKeepCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('expected a non-negative whole number');
  }
  return parsed;
}

async function watch(options: { config?: string; processExisting?: boolean }) {
  const { settings, configDir } = loadOrExit(options.config);
  const agent = await startAgent({ settings, configDir, processExisting: options.processExisting });

  await new Promise<void>((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'agent: stop signal received');
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      agent.stop().then(resolve, (err: unknown) => {
        logger.error({ err }, 'agent: error while stopping');
        resolve();
      });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

function parse(file: string) {
  const content = readFileSync(file, 'utf8');
  parseMetadata(content).match(
    (metadata) => {
      process.stdout.write(`${JSON.stringify(metadata, null, 2)}\n`);
    },
    (error) => {
      process.stderr.write(`${error.code}: ${error.message}\n`);
      process.exitCode = 1;
    }
  );
}

async function prune(options: { config?: string; keep?: number }) {
  const { settings } = loadOrExit(options.config);
  const keep = options.keep ?? settings.publish.keepCount;
  const removed = await new Publisher(settings.paths.publishDir).prune(keep);
  process.stdout.write(`Removed ${removed} old file(s) from ${settings.paths.publishDir}\n`);
}

async function history(project: string, part: string, options: { config?: string }) {
  const { settings } = loadOrExit(options.config);
  const store = await createStore(settings);
  const changelog = await store.readChangelog(project, part);
  if (!changelog || changelog.entries.length === 0) {
    process.stderr.write(`No versions archived for ${project} / ${part}\n`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`${changelog.entries.map((entry) => entry.text).join('\n\n')}\n`);
}

const program = new Command();

program
  .name('chip-warden')
  .description('Versions, archives and publishes machine programs posted by the CAM post processor');

program
  .command('watch', { isDefault: true })
  .description('Watch the drop directory and process new programs')
  .option('-c, --config <file>', 'path to config.yml')
  .option('--process-existing', 'process files already in the drop directory before watching')
  .action(watch);

program
  .command('parse')
  .description('Print the Chip Warden metadata of a program file')
  .argument('<file>', 'program file')
  .action(parse);

program
  .command('prune')
  .description('Apply the retention count to the machine share once')
  .option('-c, --config <file>', 'path to config.yml')
  .option('-k, --keep <n>', 'copies to keep per part', parseKeepCount)
  .action(prune);

program
  .command('history')
  .description('Print the changelog of an archived part, newest first')
  .argument('<project>', 'project name')
  .argument('<part>', 'part name')
  .option('-c, --config <file>', 'path to config.yml')
  .action(history);

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'chip-warden: uncaught exception');
});

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'chip-warden: unhandled rejection');
});

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ err }, 'chip-warden: command failed');
  process.exitCode = 1;
});
