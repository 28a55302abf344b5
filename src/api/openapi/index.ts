import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';

const API_TITLE = 'Deed Validation API';
const DOCUMENT_PATH = join(dirname(fileURLToPath(import.meta.url)), 'spec.yaml');

export type OpenApiDocument = Record<string, unknown>;

/** Parsed once per app; spec.yaml ships beside this module (copied into dist by `build`). */
export function loadOpenApiDocument(path: string = DOCUMENT_PATH): OpenApiDocument {
  const parsed: unknown = YAML.parse(readFileSync(path, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`OpenAPI document at '${path}' is not a mapping`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function setupOpenAPI(app: Express, document: OpenApiDocument = loadOpenApiDocument()): void {
  app.get('/openapi.json', (_req, res) => {
    res.json(document);
  });

  app.use(
    '/docs',
    swaggerUi.serve,
    swaggerUi.setup(document, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: API_TITLE,
    }),
  );
}
