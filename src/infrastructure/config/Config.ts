import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  APP_NAME: z.string().min(1).default('Bank Ledger Service'),
  IMPORT_MAX_FILE_SIZE_MB: z.coerce.number().positive().default(5),
  CORS_ORIGIN: z.string().default('*'),
});

export interface AppConfig {
  server: {
    port: number;
    corsOrigin: string;
  };
  imports: {
    maxFileSizeBytes: number;
  };
  app: {
    name: string;
    version: string;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);

  return {
    server: {
      port: parsed.PORT,
      corsOrigin: parsed.CORS_ORIGIN,
    },
    imports: {
      maxFileSizeBytes: parsed.IMPORT_MAX_FILE_SIZE_MB * 1024 * 1024,
    },
    app: {
      name: parsed.APP_NAME,
      version: '0.1.0',
    },
  };
};
