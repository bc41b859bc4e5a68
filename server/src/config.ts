import path from 'node:path';
import { z } from 'zod';
import { isValidUserName } from '../../src/db/database.js';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  DATA_DIR: z.string().min(1).default('data'),
  DEFAULT_USER: z.string().refine(isValidUserName, 'Expected a plain file name').default('default'),
});

export interface ServerConfig {
  port: number;
  dataDir: string;
  defaultUser: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = ConfigSchema.parse(env);
  return {
    port: parsed.PORT,
    dataDir: path.resolve(parsed.DATA_DIR),
    defaultUser: parsed.DEFAULT_USER,
  };
}
