/**
 * @fileoverview Formato legible de tamaños, velocidades, ETA y textos del backend.
 * @module utils/format
 */

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + sizes[i];
}

export function formatSpeed(bytesPerSec: number): string {
  return `${formatBytes(bytesPerSec)}/s`;
}

/**
 * ETA según magnitud: "45s", "2m 5s" o "1h 1m". Devuelve '' si no hay estimación.
 */
export function formatEta(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds) || seconds < 0) return '';
  if (seconds < 60) {
    return `${Math.floor(seconds)}s`;
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)}m ${Math.floor(seconds % 60)}s`;
  }
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
}

export function truncate(text: string, length: number): string {
  return text.length > length ? text.slice(0, length) : text;
}

// Secuencias de escape ANSI que yt-dlp mete en stderr cuando cree estar en una TTY
/* eslint-disable-next-line no-control-regex */
const ANSI_PATTERN = /\x1b\[[0-9;]*[A-Za-z]/g;

/** Limpia códigos ANSI y espacios sobrantes de un texto del backend. */
export function sanitizeText(text: unknown): string {
  const str = typeof text === 'string' ? text : String(text);
  return str.replace(ANSI_PATTERN, '').trim();
}
