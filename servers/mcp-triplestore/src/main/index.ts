import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { GetPromptRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from '../config.js';
import { createBackend } from '../storage/index.js';
import { TripleStore } from '../triple-store.js';
import { setupTools } from './tools.js';
import { SYSTEM_PROMPT, TOOL_PROMPTS } from './prompts.js';

export async function main() {
  console.error('Starting mcp-triplestore server...');

  const config = loadConfig();
  const store = await TripleStore.open(createBackend(config), {
    clear: config.clearOnStart,
  });
  console.error(
    config.backend === 'sqlite'
      ? `Database opened at ${config.dbPath}`
      : `Connected to Neo4j at ${config.neo4j?.uri}`
  );

  const server = new Server(
    { name: 'mcp-triplestore', version: '1.0.0' },
    { capabilities: { tools: {}, prompts: {} } }
  );

  setupTools(server, store);

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const promptName = request.params.name || 'system';
    const promptContent = TOOL_PROMPTS[promptName] || SYSTEM_PROMPT;
    return {
      messages: [
        { role: 'user', content: { type: 'text', text: promptContent } },
      ],
    };
  });

  const shutdown = () => {
    void store
      .close()
      .catch((error) => console.error('Error closing triple store:', error))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  console.error('Starting server...');
  await server.connect(transport);
  console.error('Server started!');
}

main().catch((error) => {
  console.error('Error in main:', error);
  process.exit(1);
});
