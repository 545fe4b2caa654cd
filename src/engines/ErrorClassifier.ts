/**
 * Clasificación de errores del backend para decidir si se reintenta.
 *
 * El backend solo entrega texto, así que la clasificación es por subcadena (sin distinguir
 * mayúsculas) y en este orden de prioridad:
 *
 * - `DRM_UNSUPPORTED`: el texto menciona DRM. No se reintenta.
 * - `PRIVATE_CONTENT`: "private video". No se reintenta.
 * - `AUTH_REQUIRED`: login/cookie en una plataforma con login obligatorio. No se reintenta.
 * - `ACCESS_BLOCKED`: "ip address is blocked". No se reintenta.
 * - `RATE_LIMITED`: 403 / Forbidden. Se reintenta, se registra como posible rate limit.
 * - `BACKEND_ERROR`: cualquier otro. Se reintenta.
 *
 * @module engines/ErrorClassifier
 */

import config from '../config';
import { ERROR_CODES, isRetryableCode, type ErrorCode } from '../../shared/constants/errors';
import { sanitizeText, truncate } from '../utils/format';
import { isLoginRestrictedPlatform } from '../utils/validation';

export interface ClassifiedError {
  code: ErrorCode;
  retryable: boolean;
  /** Texto completo (para logs). */
  message: string;
  /** Texto truncado para mostrar al usuario. */
  displayMessage: string;
}

/** Error con código de la taxonomía del motor. */
export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.retryable = isRetryableCode(code);
  }
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return sanitizeText(error.message);
  return sanitizeText(error);
}

export function classifyMessage(message: string, url = ''): ErrorCode {
  const lower = message.toLowerCase();

  if (lower.includes('drm')) {
    return ERROR_CODES.DRM_UNSUPPORTED;
  }
  if (lower.includes('private video')) {
    return ERROR_CODES.PRIVATE_CONTENT;
  }
  if (isLoginRestrictedPlatform(url) && (lower.includes('login') || lower.includes('cookie'))) {
    return ERROR_CODES.AUTH_REQUIRED;
  }
  if (lower.includes('ip address is blocked')) {
    return ERROR_CODES.ACCESS_BLOCKED;
  }
  if (lower.includes('403') || lower.includes('forbidden')) {
    return ERROR_CODES.RATE_LIMITED;
  }
  return ERROR_CODES.BACKEND_ERROR;
}

/**
 * Clasifica un error lanzado por el backend. Un EngineError conserva su código tal cual.
 */
export function classifyError(error: unknown, url = ''): ClassifiedError {
  const message = errorMessageOf(error) || 'Error desconocido';
  const code = error instanceof EngineError ? error.code : classifyMessage(message, url);
  return {
    code,
    retryable: isRetryableCode(code),
    message,
    displayMessage: truncate(message, config.retry.errorMessageMaxLength),
  };
}
