import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { getCountyCatalog, initCountyCatalog } from '../infrastructure/county-catalog.js';
import { createLLMProviderFromConfig } from '../infrastructure/llm/index.js';
import { logger } from '../infrastructure/logger.js';

function main(): void {
  const config = loadConfig();
  logger.level = config.logLevel;

  initCountyCatalog(config.countyCatalogPath);
  const catalog = getCountyCatalog();
  const llm = createLLMProviderFromConfig(config);

  const app = createApp({ catalog, llm });

  app.listen(config.port, () => {
    logger.info({ port: config.port, llmProvider: config.llmProvider, counties: catalog.length }, 'Deed validation API started');
  });
}

try {
  main();
} catch (err) {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
}
