/**
 * Interactive chat against an Azure deployment.
 *
 * Reads AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_KEY and AZURE_OPENAI_DEPLOYMENT
 * from the environment; LOG_LEVEL sets the log level. Type `exit` to quit.
 *
 * Run with: npx tsx examples/chat.ts
 */

import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import {
  createClientFromEnv,
  createLogger,
  isChatClientError,
  parseLogLevel,
  LogLevel,
} from '../src/index.js';

async function main(): Promise<void> {
  const logger = createLogger({ level: parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.Warn });
  const client = createClientFromEnv(process.env, { logger });
  const rl = readline.createInterface({ input, output });

  console.log('Type a message, or "exit" to quit.');

  try {
    for (;;) {
      const prompt = (await rl.question('> ')).trim();
      if (prompt === 'exit') break;
      if (!prompt) continue;

      try {
        const stream = await client.askStream(prompt);
        for await (const fragment of stream) {
          output.write(fragment);
        }
        output.write('\n');
      } catch (error) {
        if (!isChatClientError(error)) throw error;
        console.error(`\n[${error.kind}] ${error.message}`);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
