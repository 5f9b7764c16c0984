#!/usr/bin/env node

import { Command } from 'commander';
import { AppConfig } from '../shared/types/config';
import { exportConfig, importConfig, loadConfig, resolveConfigPath } from './config/configStore';
import { ConnectionAcceptor, SessionEndEvent } from './network/ConnectionAcceptor';
import { describeFailure } from './network/errors';
import { FileSender } from './transfer/FileSender';
import { initializeLogger, logger } from './utils/logger';
import { ensureChunkSize, ensurePort } from './utils/validation';

interface ConnectionFlags {
  host?: string;
  port?: string;
  config?: string;
}

interface ServeFlags extends ConnectionFlags {
  receiveDir?: string;
}

interface SendFlags extends ConnectionFlags {
  chunkSize?: string;
}

let activeAcceptor: ConnectionAcceptor | null = null;

async function prepare(configPath?: string): Promise<AppConfig> {
  const config = await loadConfig(resolveConfigPath(configPath));
  initializeLogger(config.logging);
  return config;
}

async function handleServe(flags: ServeFlags): Promise<void> {
  const config = await prepare(flags.config);
  const host = flags.host ?? config.server.host;
  const port = flags.port === undefined ? config.server.port : ensurePort(Number(flags.port));
  const receiveDir = flags.receiveDir ?? config.server.receiveDir;

  const acceptor = new ConnectionAcceptor({
    pollIntervalMs: config.server.pollIntervalMs,
    lingerMs: config.server.lingerMs,
  });
  acceptor.on('session-end', ({ remoteAddress, result }: SessionEndEvent) => {
    if (!result.success) {
      logger.warn(`Transfer from ${remoteAddress} failed: ${describeFailure(result.failure)}`);
    }
  });

  await acceptor.start(host, port, receiveDir);
  activeAcceptor = acceptor;
  logger.info('Press Ctrl+C to stop the server');

  const shutdown = () => {
    logger.info('Shutting down server...');
    void acceptor.stop().then(() => {
      activeAcceptor = null;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function handleSend(files: string[], flags: SendFlags): Promise<void> {
  const config = await prepare(flags.config);
  const sender = new FileSender({
    host: flags.host ?? config.client.host,
    port: flags.port === undefined ? config.client.port : ensurePort(Number(flags.port)),
    chunkSize:
      flags.chunkSize === undefined ? config.client.chunkSize : ensureChunkSize(Number(flags.chunkSize)),
    maxConcurrentTransfers: config.client.maxConcurrentTransfers,
  });

  if (files.length === 1) {
    const result = await sender.sendFile(files[0]);
    if (!result.success) {
      process.exitCode = 1;
    }
    return;
  }

  const results = await sender.sendMultipleFiles(files);
  const failed = results.filter(({ result }) => !result.success);
  logger.info(`Sent ${results.length - failed.length} of ${results.length} files`);
  if (failed.length > 0) {
    process.exitCode = 1;
  }
}

async function handleConfigExport(target: string, configPath?: string): Promise<void> {
  const config = await prepare(configPath);
  const exportPath = await exportConfig(config, target);
  logger.info(`Configuration exported to ${exportPath}`);
}

async function handleConfigImport(source: string, configPath?: string): Promise<void> {
  const targetPath = resolveConfigPath(configPath);
  await importConfig(source, targetPath);
  logger.info(`Configuration imported from ${source} into ${targetPath}`);
}

const program = new Command();

program
  .name('filerelay')
  .description('Send files to a filerelay server over TCP, or run one')
  .version('1.0.0');

program
  .command('serve')
  .description('Receive files into a directory until interrupted')
  .option('-H, --host <host>', 'Address to bind')
  .option('-p, --port <port>', 'Port to listen on')
  .option('-d, --receive-dir <dir>', 'Directory to save received files')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (flags: ServeFlags) => {
    await handleServe(flags);
  });

program
  .command('send <files...>')
  .description('Send one or more files, one connection per file')
  .option('-H, --host <host>', 'Server host')
  .option('-p, --port <port>', 'Server port')
  .option('--chunk-size <bytes>', 'Bytes per data frame')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (files: string[], flags: SendFlags) => {
    await handleSend(files, flags);
  });

const configCommand = program.command('config').description('Manage configuration');

configCommand
  .command('export <target>')
  .description('Export current configuration to a JSON file')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (target: string, { config }: { config?: string }) => {
    await handleConfigExport(target, config);
  });

configCommand
  .command('import <source>')
  .description('Import configuration from a JSON file')
  .option('-c, --config <path>', 'Path to configuration JSON file')
  .action(async (source: string, { config }: { config?: string }) => {
    await handleConfigImport(source, config);
  });

void program.parseAsync(process.argv).catch(async (error) => {
  logger.error('CLI command failed', { error: error instanceof Error ? error.message : String(error) });
  if (activeAcceptor) {
    await activeAcceptor.stop();
  }
  process.exit(1);
});
