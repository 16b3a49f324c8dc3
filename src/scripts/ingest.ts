// scripts/ingest.ts
import { loadConfig, loadEnvFiles, requireIngestionSettings } from '../config/environment';
import { createServices } from '../services';
import DebugLogger from '../utils/DebugLogger';

async function ingest() {
  loadEnvFiles();
  const config = loadConfig();
  requireIngestionSettings(config);
  DebugLogger.configure(config.debugLogFile);

  const { ingestion } = createServices(config);
  const result = await ingestion.ingest(
    { user: config.mailbox.user, password: config.mailbox.password },
    config.dateRange
  );

  console.log(`Fetched ${result.fetched} emails, decoded ${result.decoded}, skipped ${result.skipped}`);
  console.log(`Indexed ${result.indexed} emails into collection '${result.collection}' at ${config.vectorStore.directory}`);
}

ingest().catch(error => {
  console.error('Ingestion failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
