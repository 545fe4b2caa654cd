/**
 * @fileoverview Códigos y mensajes de error compartidos entre el motor y cualquier front-end (CLI, UI).
 * @module shared/constants/errors
 *
 * Fuente única de verdad para la taxonomía de errores. El motor devuelve siempre un código de
 * ERROR_CODES; el texto legible se obtiene de ERROR_MESSAGES o del mensaje del backend.
 */

// =====================
// CÓDIGOS
// =====================

export const ERROR_CODES = {
  INVALID_URL: 'INVALID_URL',
  INVALID_OPTIONS: 'INVALID_OPTIONS',
  DRM_UNSUPPORTED: 'DRM_UNSUPPORTED',
  PRIVATE_CONTENT: 'PRIVATE_CONTENT',
  AUTH_REQUIRED: 'AUTH_REQUIRED',
  ACCESS_BLOCKED: 'ACCESS_BLOCKED',
  INSUFFICIENT_DISK_SPACE: 'INSUFFICIENT_DISK_SPACE',
  ALREADY_DOWNLOADING: 'ALREADY_DOWNLOADING',
  START_TOO_SOON: 'START_TOO_SOON',
  RATE_LIMITED: 'RATE_LIMITED',
  TIMEOUT: 'TIMEOUT',
  BACKEND_ERROR: 'BACKEND_ERROR',
  CANCELLED: 'CANCELLED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Códigos cuyo fallo merece otro intento tras el backoff. */
export const RETRYABLE_ERROR_CODES: readonly ErrorCode[] = [
  ERROR_CODES.RATE_LIMITED,
  ERROR_CODES.BACKEND_ERROR,
];

// =====================
// MENSAJES
// =====================

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  INVALID_URL: 'URL inválida: se espera http(s)://...',
  INVALID_OPTIONS: 'Opciones de descarga inválidas',
  DRM_UNSUPPORTED: 'Plataforma con DRM: no soportada',
  PRIVATE_CONTENT: 'Vídeo privado: no se puede descargar',
  AUTH_REQUIRED: 'La plataforma requiere iniciar sesión',
  ACCESS_BLOCKED: 'La plataforma bloqueó la dirección IP',
  INSUFFICIENT_DISK_SPACE: 'Espacio en disco insuficiente',
  ALREADY_DOWNLOADING: 'Ya hay una descarga en curso',
  START_TOO_SOON: 'Espera unos segundos entre descargas',
  RATE_LIMITED: '403 Forbidden (posible límite de peticiones)',
  TIMEOUT: 'Tiempo máximo de descarga agotado',
  BACKEND_ERROR: 'Error del backend de descarga',
  CANCELLED: 'Descarga cancelada',
};

export function isRetryableCode(code: ErrorCode): boolean {
  return RETRYABLE_ERROR_CODES.includes(code);
}

export default ERROR_MESSAGES;
