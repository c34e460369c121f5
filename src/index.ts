import { describeConfig, loadConfig } from './config/index.js';
import { startServer } from './server.js';

async function main() {
  try {
    // Missing credentials are reported per tool call, so startup never fails on them
    const config = loadConfig();

    console.log('Starting Intervals.icu MCP relay...');
    for (const line of describeConfig(config)) {
      console.log(line);
    }

    await startServer(config);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void main();
