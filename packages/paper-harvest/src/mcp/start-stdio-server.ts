import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from '../config.js';
import { Logger } from '../core/logger.js';
import type { HarvestService } from '../harvest-service.js';
import { createHarvestMcpServer } from './create-harvest-mcp-server.js';

export const startStdioServer = async (config: AppConfig, service: HarvestService, logger: Logger): Promise<void> => {
  const server = createHarvestMcpServer(config, service, logger);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('paper-harvest stdio transport ready');
};
