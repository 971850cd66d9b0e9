import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ProxmoxClient, buildTlsFetch, createLogger } from '@pvelens/reports';
import { loadConfig } from './config.js';
import { createMcpServer } from './mcp/server.js';
import { VERSION } from './version.js';

const logger = createLogger('server');

async function main(): Promise<void> {
  const config = loadConfig();
  const client = new ProxmoxClient(config.proxmox, config.credentials, buildTlsFetch(config.proxmox));

  if (!(await client.testConnection())) {
    logger.warn(
      { endpoint: config.proxmox.endpoint },
      'Proxmox API not reachable; tool calls will fail until it is',
    );
  }

  const server = createMcpServer(client, { version: VERSION, defaultOutput: config.output });
  await server.connect(new StdioServerTransport());
  logger.info({ version: VERSION, endpoint: config.proxmox.endpoint }, 'pvelens MCP server ready');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'pvelens failed to start');
  process.exit(1);
});
