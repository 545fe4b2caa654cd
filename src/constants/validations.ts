/**
 * @fileoverview Mensajes de error de validación usados por los schemas Zod.
 * @module constants/validations
 */

export const AUDIO_FORMATS = [
  'mp3',
  'm4a',
  'aac',
  'wav',
  'flac',
  'ogg',
  'opus',
  'wma',
  'aiff',
  'webm',
] as const;

export const VIDEO_RESOLUTIONS = [
  '144p',
  '240p',
  '360p',
  '480p',
  '720p',
  '1080p',
  '1440p',
  '2160p (4K)',
  '4320p (8K)',
  'Best',
] as const;

export const VIDEO_CONTAINERS = ['mp4', 'mkv', 'webm'] as const;

export const VALIDATIONS = {
  CONCURRENCY: {
    MUST_BE_INTEGER: 'Las descargas simultáneas deben ser un número entero',
    OUT_OF_RANGE: 'Las descargas simultáneas deben estar entre 1 y 10',
  },
  LIMIT: {
    MUST_BE_INTEGER: 'El límite de playlist debe ser un número entero',
    CANNOT_BE_NEGATIVE: 'El límite de playlist no puede ser negativo',
  },
  QUALITY: {
    INVALID: "La calidad de audio debe ser un bitrate en kbps o 'lossless'",
  },
  PATH: {
    CANNOT_BE_EMPTY: 'La carpeta de descargas no puede estar vacía',
  },
  GENERIC: {
    VALIDATION_ERROR: 'Error de validación',
  },
} as const;
