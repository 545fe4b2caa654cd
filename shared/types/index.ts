/**
 * @fileoverview Tipos compartidos entre el motor de descargas y sus consumidores (CLI, UI).
 * @module shared/types
 *
 * Solo DTOs serializables: ningún tipo de aquí arrastra referencias al motor.
 */

import type { ErrorCode } from '../constants/errors';

/** Estados de un ítem de descarga. */
export const ItemStatus = Object.freeze({
  PENDING: 'pending',
  DOWNLOADING: 'downloading',
  COMPLETED: 'completed',
  FAILED: 'failed',
  RETRYING: 'retrying',
  CANCELLED: 'cancelled',
} as const);

export type ItemStatusType = (typeof ItemStatus)[keyof typeof ItemStatus];

export type MediaKind = 'audio' | 'video';

/**
 * Preferencias de formato/calidad. El motor no las interpreta: viajan tal cual hasta el backend.
 */
export interface FormatOptions {
  kind: MediaKind;
  /** mp3, m4a, aac, wav, flac, ogg, opus, wma, aiff, webm */
  audioFormat: string;
  /** Bitrate en kbps como string ('320', '192'...) o 'lossless'. */
  audioQuality: string;
  /** '144p' … '4320p (8K)' o 'Best'. */
  resolution: string;
  videoContainer: string;
  subtitles: boolean;
  subtitleLanguage: string;
  embedSubtitles: boolean;
  sponsorBlock: boolean;
  thumbnail: boolean;
  metadata: boolean;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

export interface ProgressSnapshot {
  /** 0..1 */
  percent: number;
  speedBps: number;
  etaSeconds: number | null;
}

export type SessionOutcome =
  | { kind: 'all_succeeded' }
  | { kind: 'partial_failure'; failedCount: number }
  | { kind: 'failed'; code?: ErrorCode; error?: string }
  | { kind: 'cancelled' };

export interface SessionResult {
  sessionId: string;
  completed: number;
  failed: number;
  cancelled: number;
  durationSeconds: number;
  outcome: SessionOutcome;
}

export interface ItemSnapshot {
  index: number;
  url: string;
  title: string;
  status: ItemStatusType;
  retryCount: number;
  errorMessage: string;
  filePath: string | null;
}

export interface SessionSnapshot {
  sessionId: string;
  url: string;
  isCancelled: boolean;
  startTime: number | null;
  endTime: number | null;
  completedCount: number;
  failedCount: number;
  progress: number;
  items: ItemSnapshot[];
}
