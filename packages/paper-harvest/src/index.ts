#!/usr/bin/env node

import { config as loadDotEnv } from 'dotenv';
import { CLI_USAGE, CliUsageError, parseCliArgs, toConfigOverrides } from './cli/args.js';
import { parseConfig, type AppConfig, type TransportMode } from './config.js';
import { describeError, Logger } from './core/logger.js';
import { HarvestService } from './harvest-service.js';
import { startHttpServer } from './http/start-http-server.js';
import { startStdioServer } from './mcp/start-stdio-server.js';
import { getPackageVersion } from './version.js';

loadDotEnv({ quiet: true });

type Launcher = (config: AppConfig, service: HarvestService, logger: Logger) => Promise<void>;

const launchHttp: Launcher = async (config, service, logger) => {
  startHttpServer(config, service, logger);
};

const LAUNCHERS: Record<TransportMode, Launcher[]> = {
  stdio: [startStdioServer],
  http: [launchHttp],
  both: [launchHttp, startStdioServer]
};

const main = async (argv: string[]): Promise<void> => {
  const cli = parseCliArgs(argv);

  if (cli.showHelp || cli.showVersion) {
    process.stdout.write(`${cli.showHelp ? CLI_USAGE : getPackageVersion()}\n`);
    return;
  }

  const config = parseConfig(toConfigOverrides(cli));
  const logger = new Logger(config.logLevel);
  const service = HarvestService.fromConfig(config, logger);

  logger.debug('Starting paper-harvest', {
    transport: config.transport,
    downloadDir: config.acquisition.downloadDir,
    sources: service.sourceNames
  });

  for (const launch of LAUNCHERS[config.transport]) {
    await launch(config, service, logger);
  }
};

main(process.argv.slice(2)).catch((error: unknown) => {
  process.stderr.write(`paper-harvest failed to start: ${describeError(error)}\n`);
  if (error instanceof CliUsageError) {
    process.stderr.write(`\n${CLI_USAGE}\n`);
  } else if (error instanceof Error && error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exitCode = 1;
});
