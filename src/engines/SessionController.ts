/**
 * Orquestador de sesiones: precondiciones, resolución de la URL, reparto de ítems al
 * coordinador y cierre con resultado.
 *
 * Hay como mucho una sesión activa por motor. El controlador es el único consumidor de
 * los eventos del coordinador: actualiza el ProgressAggregator y publica en el bus.
 *
 * @module engines/SessionController
 */

import config from '../config';
import { ERROR_CODES, ERROR_MESSAGES, type ErrorCode } from '../../shared/constants/errors';
import {
  INFO_MESSAGES,
  formatAllSucceeded,
  formatItemCompleted,
  formatItemFailed,
  formatItemStarted,
  formatPartialSummary,
  formatResolved,
  formatRetryMessage,
  formatSessionStarting,
  formatSettingsSummary,
} from '../../shared/constants/messages';
import type { SessionOutcome, SessionResult, SessionSnapshot } from '../../shared/types';
import {
  cleanupThumbnails,
  validateDiskSpace,
  type ValidateDiskSpaceResult,
} from '../utils/fileHelpers';
import { logger } from '../utils/logger';
import { validateSessionOptions, type SessionOptions } from '../utils/schemas';
import {
  detectPlatform,
  isDrmPlatform,
  isPlaylistUrl,
  validateSessionUrl,
} from '../utils/validation';
import { ConcurrencyCoordinator, type CoordinatorEvent } from './ConcurrencyCoordinator';
import { classifyError, EngineError } from './ErrorClassifier';
import { EngineEventBus } from './EventBus';
import { ProgressAggregator } from './ProgressAggregator';
import { RetryExecutor } from './RetryExecutor';
import {
  cancelledCount,
  completedCount,
  createItem,
  createSession,
  failedCount,
  toSessionSnapshot,
} from './SessionModel';
import type { DownloadItem, DownloadSession, MediaBackend, ResolvedMedia } from './types';

const log = logger.child('Session');

export type StartSessionResult =
  | { success: true; sessionId: string; done: Promise<SessionResult> }
  | { success: false; code: ErrorCode; error: string };

export type DiskSpaceCheck = (
  _directory: string,
  _requiredMb: number
) => Promise<ValidateDiskSpaceResult>;

export type ThumbnailCleanup = (_directory: string, _sinceMs?: number) => Promise<number>;

export interface SessionControllerOptions {
  backend: MediaBackend;
  events?: EngineEventBus;
  executor?: RetryExecutor;
  itemTimeoutMs?: number;
  minStartIntervalMs?: number;
  requiredFreeSpaceMb?: number;
  checkDiskSpace?: DiskSpaceCheck;
  /** Se ejecuta solo cuando todos los ítems terminaron bien. */
  cleanupThumbnails?: ThumbnailCleanup;
  now?: () => number;
}

export interface BuiltItems {
  isPlaylist: boolean;
  title: string;
  items: DownloadItem[];
}

interface ActiveRun {
  session: DownloadSession;
  platform: string;
  downloadDir: string;
  controller: AbortController;
  aggregator: ProgressAggregator;
  bytes: Map<number, { downloaded: number; total: number }>;
}

interface RunFailure {
  code: ErrorCode;
  error: string;
}

/** Tope de entradas a resolver: el límite del usuario, o el de respaldo si es 0. */
export function effectivePlaylistLimit(limit: number): number {
  return limit > 0 ? limit : config.downloads.fallbackPlaylistLimit;
}

/**
 * Convierte la respuesta del backend en ítems.
 *
 * Las entradas sin URL se descartan antes de clasificar. Es playlist si quedan más de una,
 * si hay al menos una bajo una URL con forma de playlist, o si el backend la etiqueta así.
 * Una sola entrada bajo una URL normal se trata como ítem único. El límite se aplica antes
 * de crear los ítems.
 */
export function buildSessionItems(url: string, media: ResolvedMedia, limit: number): BuiltItems {
  const entries = media.entries.filter(entry => entry.url);
  const isPlaylist =
    entries.length > 1 ||
    (entries.length >= 1 && isPlaylistUrl(url)) ||
    media.typeTag === 'playlist';

  if (!isPlaylist) {
    const entry = entries[0];
    const title = media.title || entry?.title || 'Item 1';
    return { isPlaylist, title, items: [createItem(entry?.url || url, 1, title)] };
  }

  const items: DownloadItem[] = [];
  for (const entry of entries.slice(0, effectivePlaylistLimit(limit))) {
    const index = items.length + 1;
    items.push(createItem(entry.url, index, entry.title || `Item ${index}`));
  }
  return { isPlaylist, title: media.title || 'Playlist', items };
}

export class SessionController {
  readonly events: EngineEventBus;
  private readonly backend: MediaBackend;
  private readonly executor: RetryExecutor;
  private readonly itemTimeoutMs: number;
  private readonly minStartIntervalMs: number;
  private readonly requiredFreeSpaceMb: number;
  private readonly checkDiskSpace: DiskSpaceCheck;
  private readonly cleanupThumbnails: ThumbnailCleanup;
  private readonly now: () => number;

  private starting = false;
  private active: ActiveRun | null = null;
  private lastSession: DownloadSession | null = null;
  private lastStartAt: number | null = null;

  constructor(options: SessionControllerOptions) {
    this.backend = options.backend;
    this.events = options.events ?? new EngineEventBus();
    this.executor = options.executor ?? new RetryExecutor();
    this.itemTimeoutMs = options.itemTimeoutMs ?? config.downloads.itemTimeoutMs;
    this.minStartIntervalMs = options.minStartIntervalMs ?? config.downloads.minStartIntervalMs;
    this.requiredFreeSpaceMb = options.requiredFreeSpaceMb ?? config.downloads.requiredFreeSpaceMb;
    this.checkDiskSpace = options.checkDiskSpace ?? validateDiskSpace;
    this.cleanupThumbnails = options.cleanupThumbnails ?? cleanupThumbnails;
    this.now = options.now ?? Date.now;
  }

  isBusy(): boolean {
    return this.starting || this.active !== null;
  }

  /** Snapshot de la sesión activa o, si no hay, de la última terminada. */
  getSession(): SessionSnapshot | null {
    const session = this.active?.session ?? this.lastSession;
    return session ? toSessionSnapshot(session) : null;
  }

  /**
   * Valida las precondiciones y arranca la sesión. El resultado final llega por `done`,
   * que nunca rechaza.
   */
  async startSession(input: string, options?: unknown): Promise<StartSessionResult> {
    // Reserva síncrona: dos llamadas seguidas no pueden pasar ambas
    if (this.isBusy()) {
      return this.reject(ERROR_CODES.ALREADY_DOWNLOADING);
    }
    this.starting = true;

    try {
      // DRM se comprueba antes que el formato para dar el motivo más útil
      const checkedUrl = validateSessionUrl(input);
      const url = checkedUrl.data ?? '';
      if (!url) {
        return this.reject(ERROR_CODES.INVALID_URL);
      }
      if (isDrmPlatform(url)) {
        return this.reject(ERROR_CODES.DRM_UNSUPPORTED);
      }
      if (!checkedUrl.valid) {
        return this.reject(ERROR_CODES.INVALID_URL);
      }

      const validation = validateSessionOptions(options);
      if (!validation.success || !validation.data) {
        return this.reject(ERROR_CODES.INVALID_OPTIONS, validation.error);
      }
      const sessionOptions = validation.data;

      const startAt = this.now();
      if (this.lastStartAt !== null && startAt - this.lastStartAt < this.minStartIntervalMs) {
        return this.reject(ERROR_CODES.START_TOO_SOON);
      }

      const space = await this.checkDiskSpace(sessionOptions.downloadDir, this.requiredFreeSpaceMb);
      if (!space.valid) {
        return this.reject(ERROR_CODES.INSUFFICIENT_DISK_SPACE, space.error);
      }

      this.lastStartAt = startAt;
      const run: ActiveRun = {
        session: createSession(url, this.now()),
        platform: detectPlatform(url) ?? INFO_MESSAGES.UNKNOWN_PLATFORM,
        downloadDir: sessionOptions.downloadDir,
        controller: new AbortController(),
        aggregator: new ProgressAggregator({ now: this.now }),
        bytes: new Map(),
      };
      this.active = run;

      log.info(`Sesión ${run.session.sessionId} iniciada: ${url}`);
      log.object('Opciones de sesión', sessionOptions);
      this.events.emitLog(run.session.sessionId, 'info', formatSessionStarting(run.platform));

      const done = this.runSession(run, sessionOptions);
      return { success: true, sessionId: run.session.sessionId, done };
    } finally {
      this.starting = false;
    }
  }

  /**
   * Cancela la sesión indicada. Idempotente; devuelve false si el id no es el de la
   * sesión activa.
   */
  cancel(sessionId: string): boolean {
    const run = this.active;
    if (!run || run.session.sessionId !== sessionId) {
      return false;
    }
    if (run.session.isCancelled) {
      return true;
    }

    run.session.isCancelled = true;
    log.info(`Cancelando sesión ${sessionId}`);
    this.events.emitLog(sessionId, 'warn', INFO_MESSAGES.CANCELLING);
    run.controller.abort(new EngineError(ERROR_CODES.CANCELLED, ERROR_MESSAGES.CANCELLED));
    return true;
  }

  private reject(code: ErrorCode, detail?: string): StartSessionResult {
    const error = detail ? `${ERROR_MESSAGES[code]}: ${detail}` : ERROR_MESSAGES[code];
    log.warn(`Sesión rechazada (${code}): ${error}`);
    return { success: false, code, error };
  }

  private async runSession(run: ActiveRun, options: SessionOptions): Promise<SessionResult> {
    const { session, controller } = run;
    const signal = controller.signal;

    try {
      this.events.emitLog(session.sessionId, 'info', INFO_MESSAGES.RESOLVING);
      const endResolve = log.startOperation(`Resolución de ${session.url}`);
      const limit = effectivePlaylistLimit(options.playlistLimit);

      const resolution = await this.executor.execute(
        () => this.backend.resolve(session.url, { playlistEnd: limit, signal }),
        {
          url: session.url,
          signal,
          hooks: {
            onRetry: info => {
              this.events.emitLog(
                session.sessionId,
                'warn',
                formatRetryMessage(
                  'metadatos',
                  info.delaySeconds,
                  info.attempt,
                  info.maxAttempts,
                  info.error.code === ERROR_CODES.RATE_LIMITED
                )
              );
            },
          },
        }
      );

      endResolve(resolution.status);
      if (resolution.status === 'cancelled') {
        return this.finalize(run);
      }
      if (resolution.status === 'failed') {
        log.error(`Resolución fallida para ${session.url}: ${resolution.error.message}`);
        return this.finalize(run, {
          code: resolution.error.code,
          error: resolution.error.displayMessage,
        });
      }

      const built = buildSessionItems(session.url, resolution.value, options.playlistLimit);
      if (built.items.length === 0) {
        return this.finalize(run, {
          code: ERROR_CODES.BACKEND_ERROR,
          error: 'No se encontraron elementos descargables',
        });
      }

      session.items = built.items;
      run.aggregator.setTotalItems(built.items.length);
      this.events.emitLog(
        session.sessionId,
        'info',
        formatResolved(built.items.length, built.title, built.isPlaylist)
      );
      this.events.emitLog(
        session.sessionId,
        'info',
        formatSettingsSummary(run.platform, options.format, options.concurrency, built.items.length)
      );

      const coordinator = new ConcurrencyCoordinator({
        backend: this.backend,
        downloadOptions: { format: options.format, downloadDir: options.downloadDir },
        signal,
        concurrency: options.concurrency,
        itemTimeoutMs: this.itemTimeoutMs,
        executor: this.executor,
        report: event => this.handleCoordinatorEvent(run, event),
      });
      await coordinator.run(session.items);

      return this.finalize(run);
    } catch (error) {
      const classified = classifyError(error, session.url);
      log.error(`Error inesperado en sesión ${session.sessionId}: ${classified.message}`);
      return this.finalize(run, { code: classified.code, error: classified.displayMessage });
    }
  }

  private handleCoordinatorEvent(run: ActiveRun, event: CoordinatorEvent): void {
    const { session, aggregator } = run;
    const { item } = event;
    const total = session.items.length;

    switch (event.type) {
      case 'itemStarted':
        aggregator.startItem(item.index);
        this.emitItemStatus(session, item);
        this.events.emitLog(
          session.sessionId,
          'info',
          formatItemStarted(item.index, total, item.title)
        );
        break;

      case 'itemProgress': {
        const { progress } = event;
        run.bytes.set(item.index, {
          downloaded: progress.downloadedBytes,
          total: progress.totalBytes ?? 0,
        });
        let downloaded = 0;
        let totalBytes = 0;
        for (const sample of run.bytes.values()) {
          downloaded += sample.downloaded;
          totalBytes += sample.total;
        }
        session.downloadedBytes = downloaded;
        session.totalBytes = totalBytes;
        this.events.emitProgress(session.sessionId, aggregator.recordBytes(item.index, progress));
        break;
      }

      case 'itemRetrying': {
        const { info } = event;
        this.emitItemStatus(session, item);
        this.events.emitLog(
          session.sessionId,
          'warn',
          formatRetryMessage(
            String(item.index),
            info.delaySeconds,
            info.attempt,
            info.maxAttempts,
            info.error.code === ERROR_CODES.RATE_LIMITED
          )
        );
        break;
      }

      case 'itemCompleted':
        this.emitItemStatus(session, item);
        this.events.emitProgress(session.sessionId, aggregator.itemFinished(item.index));
        this.events.emitLog(
          session.sessionId,
          'info',
          formatItemCompleted(item.index, item.title, aggregator.completedItemCount, total)
        );
        break;

      case 'itemFailed':
        log.error(`Ítem ${item.index} (${item.url}) falló [${event.error.code}]: ${event.error.message}`);
        this.emitItemStatus(session, item);
        this.events.emitProgress(session.sessionId, aggregator.itemFinished(item.index));
        this.events.emitLog(
          session.sessionId,
          'error',
          formatItemFailed(item.index, event.error.displayMessage, aggregator.completedItemCount, total)
        );
        break;

      case 'itemCancelled':
        aggregator.itemAbandoned(item.index);
        this.emitItemStatus(session, item);
        break;
    }
  }

  private emitItemStatus(session: DownloadSession, item: DownloadItem): void {
    this.events.emitItemStatus({
      sessionId: session.sessionId,
      index: item.index,
      title: item.title,
      status: item.status,
      retryCount: item.retryCount,
      errorMessage: item.errorMessage,
    });
  }

  /**
   * Cierra la sesión: sella endTime, calcula el resultado, limpia miniaturas si todo fue bien,
   * libera el motor y lo publica.
   */
  private async finalize(run: ActiveRun, failure?: RunFailure): Promise<SessionResult> {
    const { session } = run;
    session.endTime = this.now();

    const completed = completedCount(session);
    const failed = failedCount(session);
    const cancelled = cancelledCount(session);
    const durationSeconds =
      session.startTime !== null ? (session.endTime - session.startTime) / 1000 : 0;

    let outcome: SessionOutcome;
    if (session.isCancelled) {
      outcome = { kind: 'cancelled' };
    } else if (failure) {
      outcome = { kind: 'failed', code: failure.code, error: failure.error };
    } else if (completed > 0 && failed === 0) {
      outcome = { kind: 'all_succeeded' };
    } else if (completed > 0) {
      outcome = { kind: 'partial_failure', failedCount: failed };
    } else {
      outcome = { kind: 'failed', error: formatPartialSummary(completed, failed) };
    }

    const result: SessionResult = {
      sessionId: session.sessionId,
      completed,
      failed,
      cancelled,
      durationSeconds,
      outcome,
    };

    if (outcome.kind === 'all_succeeded') {
      await this.cleanupThumbnails(run.downloadDir, session.startTime ?? undefined).catch(
        (error: unknown) => {
          log.warn('Fallo limpiando miniaturas:', error);
          return 0;
        }
      );
    }

    this.active = null;
    this.lastSession = session;

    const id = session.sessionId;
    switch (outcome.kind) {
      case 'all_succeeded':
        this.events.emitProgress(id, { percent: 1, speedBps: 0, etaSeconds: null });
        this.events.emitLog(id, 'info', formatAllSucceeded(completed, durationSeconds));
        break;
      case 'partial_failure':
        this.events.emitProgress(id, { percent: 1, speedBps: 0, etaSeconds: null });
        this.events.emitLog(id, 'warn', formatPartialSummary(completed, failed));
        break;
      case 'failed':
        if (session.items.length > 0) {
          this.events.emitProgress(id, { percent: 1, speedBps: 0, etaSeconds: null });
        }
        this.events.emitLog(id, 'error', outcome.error ?? ERROR_MESSAGES.BACKEND_ERROR);
        break;
      case 'cancelled':
        this.events.emitLog(id, 'warn', INFO_MESSAGES.CANCELLED);
        break;
    }

    log.info(
      `Sesión ${id} terminada (${outcome.kind}): ${completed} completados, ${failed} fallidos, ` +
        `${cancelled} cancelados en ${durationSeconds.toFixed(1)}s`
    );
    this.events.emitSessionFinished(result);
    return result;
  }
}

export default SessionController;
