#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall, type ToolExposureMode } from './tools/index.js';
import { getDefaultRegistry } from './data/registry.js';
import { loadConfig } from './shared/config.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';
import { createLogger, routeConsoleToStderr } from './utils/logging.js';

routeConsoleToStderr();
const log = createLogger();

const TOOL_MODE: ToolExposureMode = process.env.NUQ_TOOL_MODE === 'full' ? 'full' : 'standard';

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: getTools(TOOL_MODE) };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  return handleToolCall(request.params.name, request.params.arguments ?? {}, TOOL_MODE);
});

async function main() {
  let dataDir: string;
  try {
    dataDir = loadConfig().dataDir;
  } catch (err) {
    log(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
    log('Set NUQ_DATA_DIR=/absolute/path/to/data to configure manually');
    process.exitCode = 1;
    return;
  }

  const available = getDefaultRegistry().availableSources().map(d => d.name);
  if (available.length === 0) {
    log(`No source files found in ${dataDir}; every query will report SOURCE_UNAVAILABLE`);
  } else {
    log(`Sources available in ${dataDir}: ${available.join(', ')}`);
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log('Server started');
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch((err: unknown) => {
    log(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
