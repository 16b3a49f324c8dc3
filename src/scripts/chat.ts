// scripts/chat.ts
import readline from 'readline/promises';
import { loadConfig, loadEnvFiles } from '../config/environment';
import { createServices } from '../services';
import { SessionHistory } from '../services/Query/SessionHistory';
import DebugLogger from '../utils/DebugLogger';
import { EmailAssistantError } from '../utils/errors';

const EXIT_COMMANDS = new Set(['exit', 'quit']);

async function chat() {
  loadEnvFiles();
  const config = loadConfig();
  DebugLogger.configure(config.debugLogFile);

  const { indexer, queryEngine } = createServices(config);
  const handle = await indexer.open();
  const history = new SessionHistory();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  console.log(`Ask about your emails (${config.provider.type}). Type "exit" to quit.`);

  try {
    while (true) {
      const question = (await rl.question('\nYou: ')).trim();
      if (!question) continue;
      if (EXIT_COMMANDS.has(question.toLowerCase())) break;

      try {
        const { answer } = await queryEngine.ask(handle, question, { history });
        console.log(`\nAssistant: ${answer}`);
      } catch (error) {
        // A failed question leaves the session usable
        if (!(error instanceof EmailAssistantError)) throw error;
        console.error(`\n${error.message}`);
      }
    }
  } finally {
    rl.close();
  }
}

chat().catch(error => {
  console.error('Chat failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
