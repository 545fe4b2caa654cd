/**
 * @fileoverview Mensajes de información y resumen que el motor emite por el stream de logs.
 * @module shared/constants/messages
 *
 * Fuente única de verdad para textos de éxito/info. El motor y el CLI importan desde aquí
 * para que los logs y la salida por consola coincidan.
 */

import type { FormatOptions } from '../types';

// =====================
// MENSAJES FIJOS
// =====================

export const INFO_MESSAGES = {
  UNKNOWN_PLATFORM: 'Desconocida',
  FFMPEG_MISSING: 'FFmpeg no encontrado: hace falta para extraer audio y unir vídeo',
  CANCELLING: 'Cancelando descarga...',
  CANCELLED: 'Descarga cancelada',
  RESOLVING: 'Obteniendo información de la URL...',
} as const;

// =====================
// FUNCIONES PARA MENSAJES DINÁMICOS
// =====================

export function formatSessionStarting(platform: string): string {
  return `[${platform}] Iniciando descarga...`;
}

/**
 * Resumen de ajustes tras resolver, p. ej. "Youtube | Vídeo | 1080p | MP4 | Simultáneas: 3 | Elementos: 12".
 */
export function formatSettingsSummary(
  platform: string,
  format: Pick<FormatOptions, 'kind' | 'audioFormat' | 'audioQuality' | 'resolution' | 'videoContainer'>,
  concurrency: number,
  itemCount: number
): string {
  const media =
    format.kind === 'video'
      ? `Vídeo | ${format.resolution} | ${format.videoContainer.toUpperCase()}`
      : `Audio | ${format.audioFormat.toUpperCase()} | ${format.audioQuality}`;
  return `${platform} | ${media} | Simultáneas: ${concurrency} | Elementos: ${itemCount}`;
}

/**
 * Mensaje previo a un reintento.
 *
 * @param label - Identificador del ítem u operación (ej. "3" o "metadatos").
 */
export function formatRetryMessage(
  label: string,
  delaySeconds: number,
  attempt: number,
  maxAttempts: number,
  rateLimited = false
): string {
  const suffix = rateLimited ? ' (403 Forbidden, posible rate limit)' : '';
  return `Reintento ${label} en ${delaySeconds}s (${attempt}/${maxAttempts})${suffix}`;
}

export function formatItemStarted(index: number, total: number, title: string): string {
  return `Descargando [${index}/${total}]: ${title}`;
}

export function formatItemCompleted(index: number, title: string, done: number, total: number): string {
  return `✓ [${index}] ${title} (${done}/${total})`;
}

export function formatItemFailed(index: number, reason: string, done: number, total: number): string {
  return `✗ [${index}] ${reason} (${done}/${total})`;
}

/** Resumen final cuando todos los ítems terminaron bien. */
export function formatAllSucceeded(count: number, durationSeconds: number): string {
  return `✓ Completado: ${count} elemento(s) en ${durationSeconds.toFixed(1)}s`;
}

/** Resumen final con fallos parciales o totales. */
export function formatPartialSummary(completed: number, failed: number): string {
  return `Completados: ${completed}, Fallidos: ${failed}`;
}

export function formatResolved(count: number, title: string, isPlaylist: boolean): string {
  return isPlaylist ? `Encontrados ${count} elementos: ${title}` : `Encontrado: ${title}`;
}
