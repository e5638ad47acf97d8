import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import path from 'path';
import { loadConfig } from './config.js';
import { progressPercent } from './deadlines/format.js';

function firstText(result: unknown): string {
  if (typeof result === 'object' && result !== null && 'content' in result && Array.isArray(result.content)) {
    for (const item of result.content) {
      if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
        return item.text;
      }
    }
  }
  return '';
}

// Spawns the built server and exercises its tools against a real Canvas account
class DeadlineSmokeClient {
  private client: Client;

  constructor() {
    this.client = new Client(
      { name: 'DeadlineSmokeClient', version: '1.0.0' },
      { capabilities: {} }
    );
  }

  async start() {
    const config = loadConfig();
    const transport = new StdioClientTransport({
      command: process.execPath,
      args: [path.join(__dirname, 'index.js')],
      env: {
        ...getDefaultEnvironment(),
        CANVAS_API_TOKEN: config.apiToken,
        CANVAS_BASE_URL: config.baseUrl,
        DEADLINES_TIMEZONE: config.timezone,
        LOG_LEVEL: process.env.LOG_LEVEL ?? 'warn',
      },
      stderr: 'inherit',
    });

    await this.client.connect(transport);
    console.log('Smoke client connected to server');
  }

  async stop() {
    await this.client.close();
  }

  async listTools() {
    const response = await this.client.listTools();
    return response.tools;
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<string> {
    const start = Date.now();
    const response = await this.client.callTool({ name, arguments: args }, undefined, {
      onprogress: ({ progress, total }) => {
        console.log(`Progress: ${progressPercent(progress, total ?? 0)}%`);
      },
    });
    console.log(`${name} completed in ${Date.now() - start}ms`);
    return firstText(response);
  }
}

async function runSmokeTest() {
  const client = new DeadlineSmokeClient();

  try {
    await client.start();

    const tools = await client.listTools();
    console.log(`Available tools: ${tools.map(t => t.name).join(', ')}`);

    console.log(await client.callTool('whoami'));
    console.log(await client.callTool('get-weekly-deadlines', process.argv[2] ? { timezone: process.argv[2] } : {}));
  } finally {
    await client.stop();
  }
}

if (require.main === module) {
  runSmokeTest().catch((error: unknown) => {
    console.error('Smoke test failed:', error);
    process.exitCode = 1;
  });
}

export { DeadlineSmokeClient };
