/**
 * Pool acotado de workers que reparte ítems al RetryExecutor.
 *
 * - concurrency 1 o un único ítem: secuencial en orden de índice.
 * - en otro caso: min(concurrency, ítems) workers toman ítems de una cola en orden de
 *   índice; el orden de finalización no está garantizado.
 *
 * Cada ítem lleva su propio AbortController enlazado a la señal de la sesión y un plazo
 * (itemTimeoutMs). Al vencer el plazo el ítem pasa a failed con TIMEOUT y se aborta su
 * señal (el backend de subproceso mata el proceso); el resto de workers sigue. Los ítems
 * en cola nunca arrancan tras la cancelación.
 *
 * Los workers no comparten contadores: informan por `report` (un único consumidor).
 *
 * @module engines/ConcurrencyCoordinator
 */

import config from '../config';
import { ERROR_CODES, ERROR_MESSAGES } from '../../shared/constants/errors';
import { logger } from '../utils/logger';
import { classifyError, EngineError, type ClassifiedError } from './ErrorClassifier';
import { isTerminalStatus, transitionItem } from './ItemStateMachine';
import { RetryExecutor, type RetryInfo, type RetryOutcome } from './RetryExecutor';
import {
  ItemStatus,
  type BackendDownloadOptions,
  type BackendDownloadResult,
  type BackendProgressEvent,
  type DownloadItem,
  type MediaBackend,
} from './types';

const log = logger.child('Coordinator');

export type CoordinatorEvent =
  | { type: 'itemStarted'; item: DownloadItem }
  | { type: 'itemProgress'; item: DownloadItem; progress: BackendProgressEvent }
  | { type: 'itemRetrying'; item: DownloadItem; info: RetryInfo }
  | { type: 'itemCompleted'; item: DownloadItem }
  | { type: 'itemFailed'; item: DownloadItem; error: ClassifiedError }
  | { type: 'itemCancelled'; item: DownloadItem };

export interface CoordinatorOptions {
  backend: MediaBackend;
  downloadOptions: Omit<BackendDownloadOptions, 'signal'>;
  /** Señal global de la sesión. */
  signal: AbortSignal;
  report: (_event: CoordinatorEvent) => void;
  concurrency?: number;
  itemTimeoutMs?: number;
  executor?: RetryExecutor;
}

export interface CoordinatorResult {
  completed: number;
  failed: number;
  cancelled: number;
  notStarted: number;
}

type UnitResult =
  | { kind: 'done'; outcome: RetryOutcome<BackendDownloadResult> }
  | { kind: 'error'; error: unknown }
  | { kind: 'interrupted' };

export function clampConcurrency(value: number): number {
  const { minConcurrency, maxConcurrency } = config.downloads;
  if (!Number.isFinite(value)) return config.downloads.defaultConcurrency;
  return Math.min(maxConcurrency, Math.max(minConcurrency, Math.floor(value)));
}

export class ConcurrencyCoordinator {
  readonly concurrency: number;
  private readonly itemTimeoutMs: number;
  private readonly executor: RetryExecutor;

  constructor(private readonly options: CoordinatorOptions) {
    this.concurrency = clampConcurrency(options.concurrency ?? config.downloads.defaultConcurrency);
    this.itemTimeoutMs = options.itemTimeoutMs ?? config.downloads.itemTimeoutMs;
    this.executor = options.executor ?? new RetryExecutor();
  }

  /** Procesa los ítems y resuelve cuando todos los arrancados son terminales. */
  async run(items: readonly DownloadItem[]): Promise<CoordinatorResult> {
    const ordered = [...items].sort((a, b) => a.index - b.index);

    if (this.concurrency === 1 || ordered.length <= 1) {
      await this.runSequential(ordered);
    } else {
      await this.runPool(ordered);
    }

    return summarize(ordered);
  }

  private async runSequential(items: readonly DownloadItem[]): Promise<void> {
    for (const item of items) {
      if (this.options.signal.aborted) break;
      await this.processItem(item);
    }
  }

  private async runPool(items: readonly DownloadItem[]): Promise<void> {
    let next = 0;
    const workerCount = Math.min(this.concurrency, items.length);
    log.info(`Iniciando ${workerCount} descargas simultáneas`);

    const worker = async (): Promise<void> => {
      while (!this.options.signal.aborted) {
        const item = items[next++];
        if (!item) return;
        await this.processItem(item);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  }

  /**
   * Unidad de trabajo: un ítem de principio a fin. Nunca rechaza; el resultado queda
   * en el estado del ítem y en los eventos.
   */
  private async processItem(item: DownloadItem): Promise<void> {
    const { signal: sessionSignal } = this.options;
    if (sessionSignal.aborted || item.status !== ItemStatus.PENDING) return;

    const controller = new AbortController();
    const onSessionAbort = (): void => controller.abort(sessionSignal.reason);
    sessionSignal.addEventListener('abort', onSessionAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new EngineError(ERROR_CODES.TIMEOUT, ERROR_MESSAGES.TIMEOUT));
    }, this.itemTimeoutMs);

    const interrupted = new Promise<UnitResult>(resolve => {
      controller.signal.addEventListener('abort', () => resolve({ kind: 'interrupted' }), {
        once: true,
      });
    });

    transitionItem(item, ItemStatus.DOWNLOADING);
    this.notify({ type: 'itemStarted', item });

    const unit: Promise<UnitResult> = this.executor
      .execute(attempt => this.attemptDownload(item, attempt, controller.signal), {
        url: item.url,
        signal: controller.signal,
        hooks: {
          onAttemptFailed: (error, attempt, willRetry) => {
            if (isTerminalStatus(item.status)) return;
            item.retryCount += 1;
            log.debug(`Ítem ${item.index} intento ${attempt} falló (${error.code}): ${error.message}`);
            if (willRetry) transitionItem(item, ItemStatus.RETRYING);
          },
          onRetry: info => {
            if (!isTerminalStatus(item.status)) this.notify({ type: 'itemRetrying', item, info });
          },
        },
      })
      .then(
        (outcome): UnitResult => ({ kind: 'done', outcome }),
        (error: unknown): UnitResult => ({ kind: 'error', error })
      );

    const result = await Promise.race([unit, interrupted]);

    clearTimeout(timer);
    sessionSignal.removeEventListener('abort', onSessionAbort);

    this.finalizeItem(item, result, timedOut);
  }

  /** Entrega un evento al consumidor; un fallo suyo no debe cortar al worker. */
  private notify(event: CoordinatorEvent): void {
    try {
      this.options.report(event);
    } catch (error) {
      log.error(`Error en el consumidor de eventos (${event.type}, ítem ${event.item.index}):`, error);
    }
  }

  private async attemptDownload(
    item: DownloadItem,
    attempt: number,
    signal: AbortSignal
  ): Promise<BackendDownloadResult> {
    if (attempt > 1) {
      transitionItem(item, ItemStatus.DOWNLOADING);
    }
    const { backend, downloadOptions } = this.options;
    return backend.download(item.url, { ...downloadOptions, signal }, progress => {
      if (!isTerminalStatus(item.status)) {
        this.notify({ type: 'itemProgress', item, progress });
      }
    });
  }

  private finalizeItem(item: DownloadItem, result: UnitResult, timedOut: boolean): void {
    if (result.kind === 'done' && result.outcome.status === 'succeeded') {
      if (transitionItem(item, ItemStatus.COMPLETED, { filePath: result.outcome.value.filePath })) {
        this.notify({ type: 'itemCompleted', item });
      }
      return;
    }

    if (result.kind === 'done' && result.outcome.status === 'failed') {
      this.failItem(item, result.outcome.error);
      return;
    }

    if (result.kind === 'error') {
      this.failItem(item, classifyError(result.error, item.url));
      return;
    }

    // Cancelado por el executor o interrumpido por la señal: timeout o cancelación de sesión
    if (timedOut) {
      log.warn(`Timeout de descarga en ítem ${item.index}`);
      this.failItem(
        item,
        classifyError(new EngineError(ERROR_CODES.TIMEOUT, ERROR_MESSAGES.TIMEOUT), item.url)
      );
      return;
    }
    if (transitionItem(item, ItemStatus.CANCELLED)) {
      this.notify({ type: 'itemCancelled', item });
    }
  }

  private failItem(item: DownloadItem, error: ClassifiedError): void {
    if (transitionItem(item, ItemStatus.FAILED, { errorMessage: error.displayMessage })) {
      this.notify({ type: 'itemFailed', item, error });
    }
  }
}

function summarize(items: readonly DownloadItem[]): CoordinatorResult {
  const result: CoordinatorResult = { completed: 0, failed: 0, cancelled: 0, notStarted: 0 };
  for (const item of items) {
    if (item.status === ItemStatus.COMPLETED) result.completed++;
    else if (item.status === ItemStatus.FAILED) result.failed++;
    else if (item.status === ItemStatus.CANCELLED) result.cancelled++;
    else if (item.status === ItemStatus.PENDING) result.notStarted++;
  }
  return result;
}
