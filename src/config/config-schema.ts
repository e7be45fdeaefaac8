/**
 * Zod schemas for configuration validation
 *
 * Types are inferred from the schemas so they stay in sync. Every field is
 * optional here; defaults are applied by the resolver.
 */

import { z } from 'zod';
import { LogLevelSchema } from '../utils/logger.js';

export const CredentialsSchema = z.object({
  email: z.string().min(1).optional().describe('Sign-in email'),
  password: z.string().min(1).optional().describe('Sign-in password'),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

export const ToolsSettingsSchema = z.object({
  mergeToolPath: z.string().min(1).optional().describe('ffmpeg binary'),
  downloaderPath: z.string().min(1).optional().describe('yt-dlp binary'),
});

export type ToolsSettings = z.infer<typeof ToolsSettingsSchema>;

export const DownloadSettingsSchema = z.object({
  format: z.string().min(1).optional().describe('yt-dlp format selector'),
  mergeOutputFormat: z.string().min(1).optional().describe('Container yt-dlp muxes into when it can'),
  retries: z.number().int().nonnegative().optional().describe('yt-dlp retry count'),
  timeoutSeconds: z.number().positive().optional().describe('Timeout for one download'),
});

export type DownloadSettings = z.infer<typeof DownloadSettingsSchema>;

export const MergeSettingsSchema = z.object({
  audioCodec: z.string().min(1).optional().describe('Codec the audio stream is re-encoded to'),
  audioBitrate: z
    .string()
    .regex(/^\d+k$/, { message: 'Must be a bitrate like "192k"' })
    .optional()
    .describe('Audio bitrate'),
  minOutputBytes: z.number().int().nonnegative().optional().describe('Merged files must be larger than this'),
  timeoutSeconds: z.number().positive().optional().describe('Timeout for one merge'),
});

export type MergeSettings = z.infer<typeof MergeSettingsSchema>;

export const SessionSettingsSchema = z.object({
  headless: z.boolean().optional().describe('Run the browser without a window'),
  loginUrl: z.url().optional().describe('Sign-in page, defaults to <origin of baseUrl>/login'),
  navigationTimeoutSeconds: z.number().positive().optional().describe('Timeout for page loads'),
  stateDir: z.string().min(1).optional().describe('Directory for saved cookies and debug screenshots'),
  userAgent: z.string().min(1).optional().describe('Browser user agent'),
});

export type SessionSettings = z.infer<typeof SessionSettingsSchema>;

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  credentials: CredentialsSchema.optional().describe('Platform sign-in'),
  baseUrl: z.url().optional().describe('Address recording numbers are appended to'),
  outputDirectory: z.string().min(1).optional().describe('Where recordings are stored'),
  recordingPrefix: z
    .string()
    .regex(/^[\w-]+$/, { message: 'May only contain letters, digits, "_" and "-"' })
    .optional()
    .describe('File name prefix of every recording'),
  forceRedownload: z.boolean().optional().describe('Download recordings that already exist'),
  allowUnmergedOutput: z.boolean().optional().describe('Keep split audio/video files when ffmpeg is missing'),
  logLevel: LogLevelSchema.optional().describe('Minimum level printed to the console'),
  tools: ToolsSettingsSchema.optional(),
  download: DownloadSettingsSchema.optional(),
  merge: MergeSettingsSchema.optional(),
  session: SessionSettingsSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}

/**
 * Validate a raw configuration value
 */
export function validateConfigSafe(rawConfig: unknown): { success: true; config: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return { success: true, config: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}
