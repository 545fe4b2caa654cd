/**
 * Traducción de FormatOptions a argumentos de línea de comandos de yt-dlp.
 *
 * @module backends/downloadArgs
 */

import path from 'path';
import config from '../config';
import type { BackendDownloadOptions, FormatOptions } from '../engines/types';

/** Formato de audio elegido → códec de extracción de yt-dlp. */
export const AUDIO_CODEC_MAP: Readonly<Record<string, string>> = {
  mp3: 'mp3',
  m4a: 'm4a',
  aac: 'aac',
  wav: 'wav',
  flac: 'flac',
  ogg: 'vorbis',
  opus: 'opus',
  wma: 'wmav2',
  aiff: 'aiff',
  webm: 'opus',
};

/** Formatos sin pérdida: no aceptan calidad. */
export const LOSSLESS_AUDIO_FORMATS: readonly string[] = ['wav', 'flac', 'aiff'];

const RESOLUTION_HEIGHTS: Readonly<Record<string, number | null>> = {
  '144p': 144,
  '240p': 240,
  '360p': 360,
  '480p': 480,
  '720p': 720,
  '1080p': 1080,
  '1440p': 1440,
  '2160p (4K)': 2160,
  '4320p (8K)': 4320,
  Best: null,
};

const DEFAULT_HEIGHT = 1080;

export const SPONSORBLOCK_CATEGORIES: readonly string[] = [
  'sponsor',
  'intro',
  'outro',
  'selfpromo',
  'preview',
  'filler',
];

export const OUTPUT_TEMPLATE = '%(title)s.%(ext)s';

export function audioCodecFor(audioFormat: string): string {
  return AUDIO_CODEC_MAP[audioFormat] ?? audioFormat;
}

/** 'lossless' se traduce a la mejor calidad VBR ('0'). */
export function audioQualityFor(quality: string): string {
  return quality === 'lossless' ? '0' : quality;
}

/**
 * Selector de formato de vídeo. Con una resolución concreta el filtro de altura se aplica
 * también al fallback; resoluciones desconocidas caen a 1080p.
 */
export function videoFormatSelector(resolution: string): string {
  const height = resolution in RESOLUTION_HEIGHTS ? RESOLUTION_HEIGHTS[resolution] : DEFAULT_HEIGHT;
  if (height === null) return 'bestvideo+bestaudio/best';
  return `bestvideo[height<=${height}]+bestaudio/best[height<=${height}]`;
}

/** Primer token del idioma elegido ("es Español" → "es"). */
export function subtitleLangCode(language: string): string {
  return language.trim().split(/\s+/)[0] || 'en';
}

function thumbnailArgs(): string[] {
  return ['--embed-thumbnail', '--convert-thumbnails', 'jpg'];
}

function audioArgs(format: FormatOptions): string[] {
  const args = ['-f', 'bestaudio/best', '-x', '--audio-format', audioCodecFor(format.audioFormat)];
  if (!LOSSLESS_AUDIO_FORMATS.includes(format.audioFormat)) {
    args.push('--audio-quality', audioQualityFor(format.audioQuality));
  }
  if (format.metadata) args.push('--embed-metadata');
  if (format.thumbnail) args.push(...thumbnailArgs());
  return args;
}

function videoArgs(format: FormatOptions): string[] {
  const args = [
    '-f',
    videoFormatSelector(format.resolution),
    '--merge-output-format',
    format.videoContainer,
  ];

  if (format.subtitles) {
    args.push('--write-subs', '--write-auto-subs', '--sub-langs', subtitleLangCode(format.subtitleLanguage));
    if (format.embedSubtitles) args.push('--embed-subs');
  }
  if (format.sponsorBlock) {
    args.push(
      '--sponsorblock-remove',
      SPONSORBLOCK_CATEGORIES.join(','),
      '--sponsorblock-chapter-title',
      '[SponsorBlock] %(category)s'
    );
  }
  if (format.thumbnail) args.push(...thumbnailArgs());
  if (format.metadata) args.push('--embed-metadata');
  return args;
}

/** Argumentos de formato según el tipo de descarga. */
export function buildFormatArgs(format: FormatOptions): string[] {
  return format.kind === 'video' ? videoArgs(format) : audioArgs(format);
}

/** Opciones de estabilidad comunes: reanudación, reintentos de red y plantilla de salida. */
export function buildCommonArgs(downloadDir: string): string[] {
  const { retries, fragmentRetries, socketTimeoutSeconds } = config.backend;
  return [
    '--no-playlist',
    '--continue',
    '--force-overwrites',
    '--retries',
    String(retries),
    '--fragment-retries',
    String(fragmentRetries),
    '--socket-timeout',
    String(socketTimeoutSeconds),
    '-o',
    path.join(downloadDir, OUTPUT_TEMPLATE),
  ];
}

/** `-J --flat-playlist`: metadatos sin descargar, como mucho `playlistEnd` entradas. */
export function buildResolveArgs(url: string, playlistEnd: number): string[] {
  return [
    '-J',
    '--flat-playlist',
    '--playlist-end',
    String(playlistEnd),
    '--no-warnings',
    '--socket-timeout',
    String(config.backend.socketTimeoutSeconds),
    '--',
    url,
  ];
}

/**
 * Descarga con progreso estructurado: una línea JSON por actualización y la ruta final
 * impresa tras mover el archivo.
 */
export function buildDownloadArgs(
  url: string,
  options: Omit<BackendDownloadOptions, 'signal'>
): string[] {
  return [
    '--quiet',
    '--no-warnings',
    '--newline',
    '--progress',
    '--progress-template',
    'download:%(progress)j',
    '--print',
    'after_move:filepath',
    '--no-simulate',
    '--concurrent-fragments',
    String(config.backend.concurrentFragments),
    ...buildCommonArgs(options.downloadDir),
    ...buildFormatArgs(options.format),
    '--',
    url,
  ];
}

/**
 * Ruta de impersonación: progreso en texto ("NN.N%") y solo las opciones de formato
 * básicas (extracción de audio o selector de vídeo y contenedor).
 */
export function buildImpersonationArgs(
  url: string,
  options: Omit<BackendDownloadOptions, 'signal'>,
  target = config.backend.impersonateTarget
): string[] {
  const { format } = options;
  const formatArgs: string[] = [];

  if (format.kind === 'audio') {
    formatArgs.push('--extract-audio', '--audio-format', audioCodecFor(format.audioFormat));
    const quality = audioQualityFor(format.audioQuality);
    if (!LOSSLESS_AUDIO_FORMATS.includes(format.audioFormat) && quality !== '0') {
      formatArgs.push('--audio-quality', quality);
    }
  } else {
    formatArgs.push(
      '-f',
      videoFormatSelector(format.resolution),
      '--merge-output-format',
      format.videoContainer
    );
  }

  return [
    '--impersonate',
    target,
    '--quiet',
    '--no-warnings',
    '--progress',
    '--newline',
    ...buildCommonArgs(options.downloadDir),
    ...formatArgs,
    '--',
    url,
  ];
}

/** Resolución de metadatos por la ruta de impersonación. */
export function buildImpersonationResolveArgs(
  url: string,
  playlistEnd: number,
  target = config.backend.impersonateTarget
): string[] {
  return ['--impersonate', target, ...buildResolveArgs(url, playlistEnd)];
}
