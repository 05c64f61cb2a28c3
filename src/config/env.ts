import { z } from 'zod';
import winston from 'winston';

// Environment configuration schema with Zod validation
export const ConfigSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(25000),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'debug', 'verbose'])
    .default('info'),
  ADMIN_API_KEY: z.string().min(1, 'ADMIN_API_KEY is required'),
  // Discord configuration
  DISCORD_BOT_TOKEN: z.string().min(1, 'DISCORD_BOT_TOKEN is required'),
  DISCORD_AUTH_SCHEME: z.enum(['Bot', 'Bearer']).default('Bot'),
  DISCORD_API_BASE_URL: z
    .string()
    .url('DISCORD_API_BASE_URL must be a valid URL')
    .default('https://discord.com/api/v10'),
  DISCORD_MESSAGE_FETCH_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .max(100) // Discord API limit
    .default(100),
  // Google Drive configuration
  GOOGLE_DRIVE_CREDENTIALS_BASE64: z.string().optional(),
  GOOGLE_DRIVE_CREDENTIALS_FILE: z.string().optional(),
  ARCHIVE_ROOT_FOLDER: z.string().min(1).default('Discord Archive'),
  // Local paths
  TEMP_DIR: z.string().min(1).default('Temp_Export'),
  LOCAL_BACKUP_DIR: z.string().min(1).default('Local_Backup_PDFs'),
  // Worker configuration
  MAX_WORKERS: z.coerce.number().int().positive().default(4),
  MAX_UPLOAD_RETRIES: z.coerce.number().int().positive().default(3),
  UPLOAD_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  // PDF rendering
  CHROME_EXECUTABLE_PATH: z.string().min(1).default('/usr/bin/chromium'),
  PDF_SETTLE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  PDF_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
});

export type Config = z.infer<typeof ConfigSchema>;

// Create a temporary logger for config loading phase
const configLogger = winston.createLogger({
  level: 'error',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.json(),
    }),
  ],
});

// Load and validate environment configuration
export function loadConfig(): Config {
  try {
    return ConfigSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      configLogger.error('Environment configuration validation failed', {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      throw new Error('Environment configuration validation failed');
    }
    throw error;
  }
}

// Export the validated configuration
export const config = loadConfig();
