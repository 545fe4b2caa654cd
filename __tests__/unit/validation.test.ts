/**
 * Tests unitarios para src/utils/validation.ts
 */
import {
  detectPlatform,
  isDrmPlatform,
  isLoginRestrictedPlatform,
  isPlaylistUrl,
  isValidUrl,
  normalizeUrl,
  requiresImpersonation,
  validateSessionUrl,
} from '../../src/utils/validation';

describe('validation', () => {
  describe('normalizeUrl', () => {
    it('debe recortar espacios y añadir https:// si falta el esquema', () => {
      expect(normalizeUrl('  youtube.com/watch?v=abc  ')).toBe('https://youtube.com/watch?v=abc');
    });

    it('debe respetar http:// y https:// existentes', () => {
      expect(normalizeUrl('http://example.com')).toBe('http://example.com');
      expect(normalizeUrl('HTTPS://example.com')).toBe('HTTPS://example.com');
    });

    it('debe devolver vacío para una entrada vacía', () => {
      expect(normalizeUrl('   ')).toBe('');
    });
  });

  describe('isValidUrl', () => {
    it('debe aceptar URLs http(s) con host', () => {
      expect(isValidUrl('https://www.youtube.com/watch?v=abc')).toBe(true);
      expect(isValidUrl('http://a.b')).toBe(true);
    });

    it('debe rechazar URLs con espacios o sin host', () => {
      expect(isValidUrl('https://exa mple.com')).toBe(false);
      expect(isValidUrl('https://')).toBe(false);
      expect(isValidUrl('ftp://example.com')).toBe(false);
      expect(isValidUrl('')).toBe(false);
    });
  });

  describe('plataformas', () => {
    it('detectPlatform debe devolver el nombre capitalizado', () => {
      expect(detectPlatform('https://www.youtube.com/watch?v=1')).toBe('Youtube');
      expect(detectPlatform('https://soundcloud.com/a/b')).toBe('Soundcloud');
      expect(detectPlatform('https://example.com')).toBeNull();
    });

    it('debe reconocer plataformas con DRM', () => {
      expect(isDrmPlatform('https://open.spotify.com/track/1')).toBe(true);
      expect(isDrmPlatform('https://music.apple.com/album/1')).toBe(true);
      expect(isDrmPlatform('https://www.youtube.com/watch?v=1')).toBe(false);
    });

    it('debe reconocer plataformas con login obligatorio', () => {
      expect(isLoginRestrictedPlatform('https://fb.watch/abc')).toBe(true);
      expect(isLoginRestrictedPlatform('https://vimeo.com/1')).toBe(false);
    });

    it('TikTok debe requerir impersonación', () => {
      expect(requiresImpersonation('https://www.tiktok.com/@u/video/1')).toBe(true);
      expect(requiresImpersonation('https://www.youtube.com/watch?v=1')).toBe(false);
    });
  });

  describe('isPlaylistUrl', () => {
    it('debe reconocer los patrones de playlist', () => {
      expect(isPlaylistUrl('https://www.youtube.com/playlist?list=PL1')).toBe(true);
      expect(isPlaylistUrl('https://music.youtube.com/watch?v=1&list=RD1')).toBe(true);
      expect(isPlaylistUrl('https://soundcloud.com/artist/sets/album')).toBe(true);
      expect(isPlaylistUrl('https://artist.bandcamp.com/album/disco')).toBe(true);
      expect(isPlaylistUrl('https://example.com/playlist/9')).toBe(true);
    });

    it('no debe aplicar patrones de un host a otro', () => {
      expect(isPlaylistUrl('https://www.youtube.com/watch?v=1&list=RD1')).toBe(false);
      expect(isPlaylistUrl('https://example.com/sets/1')).toBe(false);
      expect(isPlaylistUrl('https://www.youtube.com/watch?v=1')).toBe(false);
    });
  });

  describe('validateSessionUrl', () => {
    it('debe devolver la URL normalizada si es válida', () => {
      expect(validateSessionUrl('vimeo.com/123')).toEqual({
        valid: true,
        data: 'https://vimeo.com/123',
      });
    });

    it('debe rechazar vacías y mal formadas', () => {
      expect(validateSessionUrl('').valid).toBe(false);
      expect(validateSessionUrl('no es una url').valid).toBe(false);
    });
  });
});
