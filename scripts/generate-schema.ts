#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod client configuration schema
 *
 * The output documents every option accepted by `new BleemeoClient(...)`,
 * with its default, for editors and non-TypeScript tooling.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ClientConfigSchema } from '../src/config/ConfigValidator';

const OUTPUT_PATH = path.join(__dirname, '../schema/client-config.schema.json');

function generateSchema() {
  console.log('🔨 Generating JSON Schema from Zod...');

  const jsonSchema = zodToJsonSchema(ClientConfigSchema, {
    name: 'ClientConfig',
    $refStrategy: 'none',
    target: 'jsonSchema7',
    definitions: {},
    errorMessages: true,
  });

  const schemaWithMetadata = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'ClientConfig',
    description: 'Options of the Bleemeo API client',
    version: '1.0.0',
    ...jsonSchema,
    examples: [
      {
        apiUrl: 'https://api.bleemeo.com',
        credentials: { mode: 'password', username: 'ops@example.com', password: 'test-secret' },
        throttleMaxAutoRetryDelayMs: 60000,
      },
    ],
  };

  fs.mkdirSync(path.dirname(OUTPUT_PATH), { recursive: true });
  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`✅ JSON Schema generated: ${OUTPUT_PATH}`);
  console.log(`📊 Schema version: ${schemaWithMetadata.version}`);
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  console.error('❌ Failed to generate JSON Schema:', error instanceof Error ? error.message : error);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
