import { formatInTimeZone } from 'date-fns-tz';
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

function isKnownTimeZone(timeZone: string): boolean {
  try {
    formatInTimeZone(new Date(0), timeZone, 'yyyy');
    return true;
  } catch {
    return false;
  }
}

const AppConfigSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  PUBLIC_BASE_URL: optionalString,
  SETUP_SECRET: optionalString,
  GOOGLE_SHEET_ID: z.string().min(1, 'GOOGLE_SHEET_ID is required'),
  GOOGLE_SHEETS_SERVICE_ACCOUNT_CLIENT_EMAIL: z.string().min(1),
  // Private keys pasted into env files carry literal "\n" sequences.
  GOOGLE_SHEETS_SERVICE_ACCOUNT_PRIVATE_KEY: z
    .string()
    .min(1)
    .transform(key => key.replace(/\\n/g, '\n')),
  LOG_SHEET_NAME: z.string().default('SOLICITACOES'),
  SLOTS_SHEET_NAME: z.string().default('AGENDA'),
  MAX_SLOTS_LISTED: z.coerce.number().int().positive().default(8),
  APP_TIME_ZONE: z
    .string()
    .default('America/Sao_Paulo')
    .refine(isKnownTimeZone, value => ({ message: `Unknown IANA time zone "${value}"` })),
  KV_REST_API_URL: optionalString,
  KV_REST_API_TOKEN: optionalString,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Reads and validates the process environment once.
 * @throws Error listing every missing or invalid variable.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig && env === process.env) {
    return cachedConfig;
  }
  const result = AppConfigSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    const errorMsg = `Invalid configuration: ${details}`;
    console.error(`[Config] ${errorMsg}`);
    throw new Error(errorMsg);
  }
  if (env === process.env) {
    cachedConfig = result.data;
  }
  return result.data;
}
