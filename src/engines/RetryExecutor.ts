/**
 * Ejecuta una operación fallible con reintentos acotados y backoff exponencial.
 *
 * Cada fallo se clasifica (ErrorClassifier); los no reintentables (DRM, privado, login,
 * IP bloqueada) cortan en el acto. La cancelación se comprueba antes de cada intento y
 * antes de cada espera, y la propia espera es abortable: un intento cancelado no consume
 * reintento y devuelve `cancelled`.
 *
 * @module engines/RetryExecutor
 */

import { setTimeout as sleepTimer } from 'timers/promises';
import config from '../config';
import backoffPolicy, { BackoffPolicy } from './BackoffPolicy';
import { classifyError, type ClassifiedError } from './ErrorClassifier';

export type RetryOutcome<T> =
  | { status: 'succeeded'; value: T; attempts: number }
  | { status: 'failed'; error: ClassifiedError; attempts: number }
  | { status: 'cancelled'; attempts: number };

export interface RetryInfo {
  /** Intento que acaba de fallar (1-based). */
  attempt: number;
  maxAttempts: number;
  delaySeconds: number;
  error: ClassifiedError;
}

export interface RetryHooks {
  onAttemptStart?: (_attempt: number) => void;
  onAttemptFailed?: (_error: ClassifiedError, _attempt: number, _willRetry: boolean) => void;
  /** Se invoca justo antes de dormir, para poder registrar "reintentando en Ns". */
  onRetry?: (_info: RetryInfo) => void;
}

export interface ExecuteOptions {
  /** URL afectada; la clasificación de login depende de la plataforma. */
  url?: string;
  signal?: AbortSignal;
  hooks?: RetryHooks;
}

export type SleepFn = (_ms: number, _signal?: AbortSignal) => Promise<void>;

export interface RetryExecutorOptions {
  maxAttempts?: number;
  backoff?: BackoffPolicy;
  sleep?: SleepFn;
}

export type RetryableOperation<T> = (_attempt: number, _signal?: AbortSignal) => Promise<T>;

/** Espera abortable; rechaza con AbortError si la señal salta. */
export const defaultSleep: SleepFn = async (ms, signal) => {
  await sleepTimer(ms, undefined, { signal });
};

export class RetryExecutor {
  readonly maxAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly sleep: SleepFn;

  constructor(options: RetryExecutorOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? config.retry.maxAttempts);
    this.backoff = options.backoff ?? backoffPolicy;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute<T>(
    operation: RetryableOperation<T>,
    options: ExecuteOptions = {}
  ): Promise<RetryOutcome<T>> {
    const { url = '', signal, hooks = {} } = options;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return { status: 'cancelled', attempts: attempt };
      }

      hooks.onAttemptStart?.(attempt + 1);

      let failure: ClassifiedError;
      try {
        const value = await operation(attempt + 1, signal);
        return { status: 'succeeded', value, attempts: attempt + 1 };
      } catch (error) {
        if (signal?.aborted) {
          return { status: 'cancelled', attempts: attempt };
        }
        failure = classifyError(error, url);
      }

      const willRetry = failure.retryable && attempt < this.maxAttempts - 1;
      hooks.onAttemptFailed?.(failure, attempt + 1, willRetry);
      if (!willRetry) {
        return { status: 'failed', error: failure, attempts: attempt + 1 };
      }

      if (signal?.aborted) {
        return { status: 'cancelled', attempts: attempt + 1 };
      }

      const delaySeconds = this.backoff.delay(attempt);
      hooks.onRetry?.({
        attempt: attempt + 1,
        maxAttempts: this.maxAttempts,
        delaySeconds,
        error: failure,
      });

      try {
        await this.sleep(delaySeconds * 1000, signal);
      } catch (sleepError) {
        if (signal?.aborted) {
          return { status: 'cancelled', attempts: attempt + 1 };
        }
        throw sleepError;
      }
    }

    // Inalcanzable: el último intento siempre devuelve (willRetry es false).
    throw new Error('RetryExecutor: bucle de reintentos terminó sin resultado');
  }
}
