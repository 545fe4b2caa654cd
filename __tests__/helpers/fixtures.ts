/**
 * Datos de prueba compartidos.
 */
import type { FormatOptions } from '../../shared/types';

export function makeFormat(overrides: Partial<FormatOptions> = {}): FormatOptions {
  return {
    kind: 'audio',
    audioFormat: 'mp3',
    audioQuality: '320',
    resolution: '1080p',
    videoContainer: 'mp4',
    subtitles: false,
    subtitleLanguage: 'en',
    embedSubtitles: false,
    sponsorBlock: false,
    thumbnail: false,
    metadata: true,
    ...overrides,
  };
}
