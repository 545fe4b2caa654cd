/**
 * API pública de mediagrab: motor de sesiones, backends yt-dlp y utilidades.
 *
 * @module mediagrab
 */

import { createDefaultBackend, type YtDlpBackendOptions } from './backends';
import {
  SessionController,
  type SessionControllerOptions,
} from './engines';
import type { MediaBackend } from './engines/types';

export * from './engines';
export * from './backends';
export { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from './constants/errors';
export type {
  FormatOptions as FormatPreferences,
  ItemSnapshot,
  LogEntry,
  LogLevel,
  ProgressSnapshot,
  SessionOutcome,
  SessionResult,
  SessionSnapshot,
} from '../shared/types';
export { default as config } from './config';
export { logger, configureLogger, cleanOldLogs } from './utils/logger';
export { validateSessionOptions, schemas } from './utils/schemas';
export type { SessionOptions, SessionOptionsInput, FormatOptionsInput } from './utils/schemas';
export { formatBytes, formatEta, formatSpeed } from './utils/format';
export { detectPlatform, isPlaylistUrl, normalizeUrl } from './utils/validation';

export interface CreateEngineOptions extends Omit<SessionControllerOptions, 'backend'> {
  /** Backend propio; por defecto el router sobre yt-dlp. */
  backend?: MediaBackend;
  ytDlp?: YtDlpBackendOptions;
}

/** Crea un SessionController listo para usar. */
export function createEngine(options: CreateEngineOptions = {}): SessionController {
  const { backend, ytDlp, ...rest } = options;
  return new SessionController({ ...rest, backend: backend ?? createDefaultBackend(ytDlp) });
}
