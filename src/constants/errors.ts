/**
 * @fileoverview Re-exporta constantes de error desde shared para uso en el motor y el CLI
 * @module constants/errors
 */

export {
  ERROR_CODES,
  ERROR_MESSAGES,
  RETRYABLE_ERROR_CODES,
  isRetryableCode,
  type ErrorCode,
} from '../../shared/constants/errors';

export { default } from '../../shared/constants/errors';
