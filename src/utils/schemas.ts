/**
 * @fileoverview Schemas Zod para las opciones de sesión y preferencias de formato.
 * @module schemas
 */

import { z } from 'zod';
import config from '../config';
import {
  AUDIO_FORMATS,
  VALIDATIONS,
  VIDEO_CONTAINERS,
  VIDEO_RESOLUTIONS,
} from '../constants/validations';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const formatOptionsSchema = z.object({
  kind: z.enum(['audio', 'video']).default('audio'),
  audioFormat: z.enum(AUDIO_FORMATS).default('mp3'),
  audioQuality: z
    .string()
    .regex(/^(\d{2,3}|lossless)$/, VALIDATIONS.QUALITY.INVALID)
    .default('320'),
  resolution: z.enum(VIDEO_RESOLUTIONS).default('1080p'),
  videoContainer: z.enum(VIDEO_CONTAINERS).default('mp4'),
  subtitles: z.boolean().default(false),
  subtitleLanguage: z.string().min(2).default('en'),
  embedSubtitles: z.boolean().default(false),
  sponsorBlock: z.boolean().default(false),
  thumbnail: z.boolean().default(false),
  metadata: z.boolean().default(true),
});

const sessionOptionsSchema = z.object({
  concurrency: z
    .number()
    .int(VALIDATIONS.CONCURRENCY.MUST_BE_INTEGER)
    .min(config.downloads.minConcurrency, VALIDATIONS.CONCURRENCY.OUT_OF_RANGE)
    .max(config.downloads.maxConcurrency, VALIDATIONS.CONCURRENCY.OUT_OF_RANGE)
    .default(config.downloads.defaultConcurrency),
  /** 0 = sin límite del usuario (se aplica el tope de config.downloads.fallbackPlaylistLimit). */
  playlistLimit: z
    .number()
    .int(VALIDATIONS.LIMIT.MUST_BE_INTEGER)
    .min(0, VALIDATIONS.LIMIT.CANNOT_BE_NEGATIVE)
    .default(config.downloads.defaultPlaylistLimit),
  downloadDir: z
    .string()
    .min(1, VALIDATIONS.PATH.CANNOT_BE_EMPTY)
    .default(config.downloads.downloadDir),
  format: formatOptionsSchema.default({}),
});

export type FormatOptionsInput = z.input<typeof formatOptionsSchema>;
export type SessionOptionsInput = z.input<typeof sessionOptionsSchema>;
export type SessionOptions = z.output<typeof sessionOptionsSchema>;

export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ZodValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
    const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
    return `${pathStr}${err.message}`;
  });
  return {
    success: false,
    error: errorMessages.join('; '),
  };
}

export function validateSessionOptions(options: unknown): ZodValidationResult<SessionOptions> {
  return validate(sessionOptionsSchema, options ?? {});
}

export const schemas = {
  formatOptions: formatOptionsSchema,
  sessionOptions: sessionOptionsSchema,
};
