/**
 * Backoff exponencial acotado, compartido por resolución de metadatos y descarga de ítems.
 *
 * delay(attempt) = min(base * 2^attempt, cap) en segundos, sin jitter.
 *
 * @module engines/BackoffPolicy
 */

import config from '../config';

export interface BackoffPolicyOptions {
  baseSeconds?: number;
  capSeconds?: number;
}

export class BackoffPolicy {
  readonly baseSeconds: number;
  readonly capSeconds: number;

  constructor(options: BackoffPolicyOptions = {}) {
    this.baseSeconds = options.baseSeconds ?? config.retry.baseDelaySeconds;
    this.capSeconds = options.capSeconds ?? config.retry.maxDelaySeconds;
  }

  /** Segundos de espera tras el intento fallido número `attempt` (0-based). */
  delay(attempt: number): number {
    if (!Number.isInteger(attempt) || attempt < 0) {
      throw new RangeError(`attempt debe ser un entero >= 0 (recibido ${attempt})`);
    }
    return Math.min(this.baseSeconds * Math.pow(2, attempt), this.capSeconds);
  }

  delayMs(attempt: number): number {
    return this.delay(attempt) * 1000;
  }
}

const backoffPolicy = new BackoffPolicy();
export default backoffPolicy;
