/**
 * Tests unitarios para src/engines/ErrorClassifier.ts
 */
import { ERROR_CODES } from '../../shared/constants/errors';
import {
  classifyError,
  classifyMessage,
  EngineError,
  errorMessageOf,
} from '../../src/engines/ErrorClassifier';

describe('ErrorClassifier', () => {
  describe('classifyMessage', () => {
    it('debe detectar DRM sin distinguir mayúsculas', () => {
      expect(classifyMessage('This video is DRM protected')).toBe(ERROR_CODES.DRM_UNSUPPORTED);
    });

    it('debe detectar vídeos privados', () => {
      expect(classifyMessage('ERROR: Private video. Sign in if you have access')).toBe(
        ERROR_CODES.PRIVATE_CONTENT
      );
    });

    it('debe exigir login solo en plataformas con login obligatorio', () => {
      const message = 'You need to log in; use --cookies. Login required';
      expect(classifyMessage(message, 'https://www.facebook.com/watch?v=1')).toBe(
        ERROR_CODES.AUTH_REQUIRED
      );
      expect(classifyMessage(message, 'https://vimeo.com/1')).toBe(ERROR_CODES.BACKEND_ERROR);
    });

    it('debe detectar IP bloqueada', () => {
      expect(classifyMessage('Your IP address is blocked from accessing this post')).toBe(
        ERROR_CODES.ACCESS_BLOCKED
      );
    });

    it('debe tratar 403 y Forbidden como rate limit', () => {
      expect(classifyMessage('HTTP Error 403')).toBe(ERROR_CODES.RATE_LIMITED);
      expect(classifyMessage('forbidden by server')).toBe(ERROR_CODES.RATE_LIMITED);
    });

    it('debe respetar la prioridad: privado antes que 403', () => {
      expect(classifyMessage('403: private video')).toBe(ERROR_CODES.PRIVATE_CONTENT);
    });

    it('cualquier otro texto debe ser error de backend', () => {
      expect(classifyMessage('Connection reset by peer')).toBe(ERROR_CODES.BACKEND_ERROR);
    });
  });

  describe('classifyError', () => {
    it('debe marcar como reintentables solo RATE_LIMITED y BACKEND_ERROR', () => {
      expect(classifyError(new Error('HTTP Error 403: Forbidden')).retryable).toBe(true);
      expect(classifyError(new Error('timed out')).retryable).toBe(true);
      expect(classifyError(new Error('Private video')).retryable).toBe(false);
      expect(classifyError(new Error('drm')).retryable).toBe(false);
    });

    it('debe truncar el mensaje para mostrar a 100 caracteres', () => {
      const long = 'x'.repeat(250);
      const classified = classifyError(new Error(long));
      expect(classified.message).toHaveLength(250);
      expect(classified.displayMessage).toHaveLength(100);
    });

    it('debe conservar el código de un EngineError', () => {
      const classified = classifyError(new EngineError(ERROR_CODES.TIMEOUT, 'tarde'));
      expect(classified.code).toBe(ERROR_CODES.TIMEOUT);
      expect(classified.retryable).toBe(false);
      expect(classified.message).toBe('tarde');
    });

    it('debe aceptar valores que no son Error', () => {
      expect(classifyError('fallo raro').message).toBe('fallo raro');
      expect(classifyError('').message).toBe('Error desconocido');
    });
  });

  it('errorMessageOf debe limpiar códigos ANSI', () => {
    expect(errorMessageOf(new Error('\x1b[0;31mERROR:\x1b[0m boom  '))).toBe('ERROR: boom');
  });
});
