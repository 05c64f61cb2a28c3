import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Config } from './env.js';
import type { DriveCredential } from '../types/archive.js';
import { DriveCredentialSchema } from '../validation/archive/schemas.js';

/**
 * Load the Google Drive credential from base64 JSON or a JSON file.
 * The base64 variable wins when both are set.
 */
export function loadDriveCredential(
  config: Pick<
    Config,
    'GOOGLE_DRIVE_CREDENTIALS_BASE64' | 'GOOGLE_DRIVE_CREDENTIALS_FILE'
  >
): DriveCredential {
  let raw: string;
  if (config.GOOGLE_DRIVE_CREDENTIALS_BASE64) {
    raw = Buffer.from(config.GOOGLE_DRIVE_CREDENTIALS_BASE64, 'base64').toString(
      'utf8'
    );
  } else if (config.GOOGLE_DRIVE_CREDENTIALS_FILE) {
    raw = readFileSync(config.GOOGLE_DRIVE_CREDENTIALS_FILE, 'utf8');
  } else {
    throw new Error(
      'Google Drive credentials are required (GOOGLE_DRIVE_CREDENTIALS_BASE64 or GOOGLE_DRIVE_CREDENTIALS_FILE)'
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error('Google Drive credentials are not valid JSON', {
      cause: error,
    });
  }

  const result = DriveCredentialSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Invalid Google Drive credentials: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
    .join(', ');
}
