import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';

// Load environment variables
dotenv.config();

// Environment validation schema
const envSchema = z.object({
  // Application
  APP_NAME: z.string().default('EPG Carousel'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),
  LOG_FILE: z.string().optional(), // Optional log file path

  // FFmpeg (logo recompression)
  FFMPEG_PATH: z.string().default('/usr/bin/ffmpeg'),
  FFPROBE_PATH: z.string().default('/usr/bin/ffprobe'),
  TEMP_DIR: z.string().default('./temp'),

  // Fetching
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  HTTP_USER_AGENT: z.string().default('epg-carousel/1.0'),
  RADIODNS_ROOT: z.string().default('radiodns.org'),
  SOURCE_POLICY: z.enum(['first-success', 'union']).default('first-success'),
  LOGO_MAX_BYTES: z.coerce.number().int().positive().default(5120),

  // MOT carousel
  MOT_SEGMENT_SIZE: z.coerce.number().int().min(1).max(8189).default(1024),
  MOT_CAROUSEL_PERIOD: z.coerce.number().int().min(0).max(0xffffff).default(0), // tenths of a second
});

// Validate and export
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  console.error(JSON.stringify(parsed.error.format(), null, 2));
  process.exit(1);
}

export const env = parsed.data;

// Derived configuration
export const config = {
  app: {
    name: env.APP_NAME,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },

  // Logging
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE,
  },

  // FFmpeg
  ffmpeg: {
    path: env.FFMPEG_PATH,
    probePath: env.FFPROBE_PATH,
  },

  paths: {
    temp: path.resolve(env.TEMP_DIR),
  },

  http: {
    timeoutMs: env.HTTP_TIMEOUT_MS,
    userAgent: env.HTTP_USER_AGENT,
  },

  discovery: {
    radiodnsRoot: env.RADIODNS_ROOT,
    sourcePolicy: env.SOURCE_POLICY,
  },

  logos: {
    maxBytes: env.LOGO_MAX_BYTES,
  },

  mot: {
    segmentSize: env.MOT_SEGMENT_SIZE,
    carouselPeriod: env.MOT_CAROUSEL_PERIOD,
  },
} as const;

// Export for testing
export type Config = typeof config;
