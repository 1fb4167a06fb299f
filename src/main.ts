// Must stay first: the logger reads its settings when it loads
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createQueryServer } from './server/QueryServer.js';
import { logger } from './utils/logger.js';

export async function main(): Promise<void> {
  const server = createQueryServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('server:listening', { transport: 'stdio' });
}
