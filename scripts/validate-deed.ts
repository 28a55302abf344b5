import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig } from '../src/infrastructure/config.js';
import { getCountyCatalog, initCountyCatalog } from '../src/infrastructure/county-catalog.js';
import { createLLMProviderFromConfig } from '../src/infrastructure/llm/index.js';
import { processDocument } from '../src/services/pipeline/index.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'validate-deed' });

function printUsage(): never {
  console.error('Usage: npm run validate:deed -- <deed-text-path>');
  console.error('Example: npm run validate:deed -- ./data/sample-deed.txt');
  process.exit(1);
}

async function main(): Promise<void> {
  const [textPath] = process.argv.slice(2);
  if (!textPath) printUsage();

  const config = loadConfig();
  logger.level = config.logLevel;

  initCountyCatalog(config.countyCatalogPath);
  const llm = createLLMProviderFromConfig(config);

  const rawText = await readFile(resolve(textPath), 'utf-8');
  log.info({ textPath, llmProvider: config.llmProvider }, 'Validating deed');

  const outcome = await processDocument({ llm, catalog: getCountyCatalog() }, rawText);

  console.log(JSON.stringify(outcome, null, 2));
  process.exitCode = outcome.status === 'accepted' ? 0 : 1;
}

main().catch((error: unknown) => {
  log.error({ error }, 'Unhandled error');
  console.error(error);
  process.exit(1);
});
