/**
 * Tipos y contratos compartidos por el motor de descargas.
 *
 * Define las entidades DownloadItem y DownloadSession, el contrato MediaBackend que el
 * motor consume (resolución de metadatos y descarga de un ítem) y los eventos de progreso
 * que los backends entregan.
 *
 * @module engines/types
 */

import type { FormatOptions, ItemStatusType } from '../../shared/types';

export { ItemStatus } from '../../shared/types';
export type { ItemStatusType, FormatOptions } from '../../shared/types';

export interface DownloadItem {
  url: string;
  /** Posición 1-based, estable dentro de la sesión. */
  index: number;
  title: string;
  status: ItemStatusType;
  retryCount: number;
  /** Solo con status failed; texto ya truncado para mostrar. */
  errorMessage: string;
  startTime: number | null;
  /** Solo al terminar en completed o failed. */
  endTime: number | null;
  filePath: string | null;
}

export interface DownloadSession {
  sessionId: string;
  url: string;
  items: DownloadItem[];
  startTime: number | null;
  endTime: number | null;
  totalBytes: number;
  downloadedBytes: number;
  isCancelled: boolean;
}

// ---------------------------------------------------------------------------
// Contrato del backend
// ---------------------------------------------------------------------------

export interface ResolveOptions {
  /** Tope de entradas a resolver (playlistEnd). */
  playlistEnd: number;
  signal?: AbortSignal;
}

export interface ResolvedEntry {
  url: string;
  title?: string;
}

export interface ResolvedMedia {
  /** Etiqueta de tipo que informa el backend ('playlist', 'video'...), si la hay. */
  typeTag?: string;
  title?: string;
  /** Vacío cuando la URL es un único vídeo sin lista de entradas. */
  entries: ResolvedEntry[];
}

export interface BackendDownloadOptions {
  format: FormatOptions;
  downloadDir: string;
  signal?: AbortSignal;
}

export type BackendProgressPhase = 'downloading' | 'finished';

export interface BackendProgressEvent {
  phase: BackendProgressPhase;
  downloadedBytes: number;
  totalBytes?: number;
  fragmentIndex?: number;
  fragmentCount?: number;
  /** Fracción 0..1 ya calculada por el backend (ej. salida "NN.N%"). */
  fraction?: number;
  filename?: string;
}

export interface BackendDownloadResult {
  filePath?: string;
}

/**
 * Backend de medios opaco: el motor solo orquesta llamadas a él.
 * Ambos métodos deben rechazar con un Error cuyo mensaje describa el fallo
 * (el motor clasifica por texto) y respetar `signal`.
 */
export interface MediaBackend {
  readonly name: string;
  resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia>;
  download(
    url: string,
    options: BackendDownloadOptions,
    onProgress: (_event: BackendProgressEvent) => void
  ): Promise<BackendDownloadResult>;
}
