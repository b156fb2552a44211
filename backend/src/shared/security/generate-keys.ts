/**
 * backend/src/shared/security/generate-keys.ts
 *
 * CLI wrapper around generateSigningKeys(). Prints env lines to stdout.
 *
 * HOW TO USE:
 * - npm run keys:generate --workspace backend -- --algorithm RS256 --kid key-2031
 */

import { parseArgs } from 'node:util';

import { z } from 'zod';

import { logger } from '../logger/logger';
import { generateSigningKeys } from './signing-keys';

const ArgsSchema = z.object({
  algorithm: z.enum(['HS256', 'RS256']).default('RS256'),
  kid: z
    .string()
    .min(1)
    .default(() => `key-${new Date().toISOString().slice(0, 10)}`),
});

function main(): void {
  const { values } = parseArgs({
    options: {
      algorithm: { type: 'string' },
      kid: { type: 'string' },
    },
  });
  const args = ArgsSchema.parse(values);

  const generated = generateSigningKeys({ algorithm: args.algorithm, keyId: args.kid });

  for (const [name, value] of Object.entries(generated.env)) {
    process.stdout.write(`${name}=${value}\n`);
  }

  logger.info('keys.generated', { algorithm: args.algorithm, keyId: args.kid });
}

try {
  main();
} catch (err) {
  logger.error('keys.generate.failed', { err });
  process.exit(1);
}
