/**
 * Construcción de sesiones e ítems, contadores derivados y snapshots de solo lectura.
 *
 * Los contadores (completados, fallidos, progreso) se calculan siempre a partir de los
 * ítems; la sesión no guarda copias que puedan desincronizarse.
 *
 * @module engines/SessionModel
 */

import type { ItemSnapshot, SessionSnapshot } from '../../shared/types';
import { ItemStatus, type DownloadItem, type DownloadSession } from './types';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Id derivado de la hora de creación (YYYYMMDD_HHMMSS) más un sufijo aleatorio corto. */
export function createSessionId(date = new Date()): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${stamp}-${Math.random().toString(36).substring(2, 8)}`;
}

export function createSession(url: string, now = Date.now()): DownloadSession {
  return {
    sessionId: createSessionId(new Date(now)),
    url,
    items: [],
    startTime: now,
    endTime: null,
    totalBytes: 0,
    downloadedBytes: 0,
    isCancelled: false,
  };
}

export function createItem(url: string, index: number, title = ''): DownloadItem {
  if (!url) {
    throw new TypeError('El ítem necesita una URL');
  }
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`index debe ser un entero positivo (recibido ${index})`);
  }
  return {
    url,
    index,
    title,
    status: ItemStatus.PENDING,
    retryCount: 0,
    errorMessage: '',
    startTime: null,
    endTime: null,
    filePath: null,
  };
}

export function completedCount(session: DownloadSession): number {
  return session.items.filter(item => item.status === ItemStatus.COMPLETED).length;
}

export function failedCount(session: DownloadSession): number {
  return session.items.filter(item => item.status === ItemStatus.FAILED).length;
}

export function cancelledCount(session: DownloadSession): number {
  return session.items.filter(item => item.status === ItemStatus.CANCELLED).length;
}

/** completados / total, 0 si la sesión no tiene ítems. */
export function sessionProgress(session: DownloadSession): number {
  if (session.items.length === 0) return 0;
  return completedCount(session) / session.items.length;
}

/** Duración en segundos, 0 si falta alguno de los sellos. */
export function itemDuration(item: DownloadItem): number {
  if (item.startTime !== null && item.endTime !== null) {
    return (item.endTime - item.startTime) / 1000;
  }
  return 0;
}

export function toItemSnapshot(item: DownloadItem): ItemSnapshot {
  return {
    index: item.index,
    url: item.url,
    title: item.title,
    status: item.status,
    retryCount: item.retryCount,
    errorMessage: item.errorMessage,
    filePath: item.filePath,
  };
}

export function toSessionSnapshot(session: DownloadSession): SessionSnapshot {
  return {
    sessionId: session.sessionId,
    url: session.url,
    isCancelled: session.isCancelled,
    startTime: session.startTime,
    endTime: session.endTime,
    completedCount: completedCount(session),
    failedCount: failedCount(session),
    progress: sessionProgress(session),
    items: session.items.map(toItemSnapshot),
  };
}
