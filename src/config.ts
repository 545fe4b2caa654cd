/**
 * Configuración por defecto del motor (valores de runtime).
 *
 * Aquí se definen reintentos, límites de concurrencia, timeouts por ítem, parámetros del
 * backend yt-dlp y listas de plataformas. Algunas claves admiten override por variables de
 * entorno (MEDIAGRAB_*), validadas con zod al cargar el módulo.
 *
 * @module config
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import type { AppConfig } from './config.d';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

// Cada clave cae a undefined por separado: un valor inválido no anula los demás
const envSchema = z.object({
  MEDIAGRAB_YTDLP_PATH: z.string().min(1).optional().catch(undefined),
  MEDIAGRAB_FFMPEG_PATH: z.string().min(1).optional().catch(undefined),
  MEDIAGRAB_DOWNLOAD_DIR: z.string().min(1).optional().catch(undefined),
  MEDIAGRAB_LOG_LEVEL: logLevelSchema.optional().catch(undefined),
  NODE_ENV: z.string().optional().catch(undefined),
});

export type EnvOverrides = z.infer<typeof envSchema>;

/**
 * Lee las variables MEDIAGRAB_* del entorno. Cada valor inválido se ignora (queda el default
 * de esa clave) en lugar de abortar el arranque.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  const parsed = envSchema.safeParse(env);
  return parsed.success ? parsed.data : {};
}

const env = readEnvOverrides();
const isTest = env.NODE_ENV === 'test';

const config: AppConfig = {
  retry: {
    maxAttempts: 3,
    baseDelaySeconds: 2,
    maxDelaySeconds: 30,
    errorMessageMaxLength: 100,
  },

  downloads: {
    defaultConcurrency: 3,
    minConcurrency: 1,
    maxConcurrency: 10,
    itemTimeoutMs: 5 * 60 * 1000,
    minStartIntervalMs: 2000,
    requiredFreeSpaceMb: 500,
    defaultPlaylistLimit: 50,
    fallbackPlaylistLimit: 500,
    downloadDir: env.MEDIAGRAB_DOWNLOAD_DIR ?? path.join(os.homedir(), 'Downloads', 'mediagrab'),
  },

  progress: {
    speedSampleIntervalMs: 1000,
    unknownExtentFraction: 0.5,
  },

  backend: {
    binaryPath: env.MEDIAGRAB_YTDLP_PATH ?? 'yt-dlp',
    impersonateTarget: 'chrome',
    impersonationHosts: Object.freeze(['tiktok.com']),
    socketTimeoutSeconds: 30,
    retries: 10,
    fragmentRetries: 10,
    concurrentFragments: 4,
    processExitTimeoutMs: 60_000,
    ffmpegPath: env.MEDIAGRAB_FFMPEG_PATH ?? 'ffmpeg',
    ffmpegCheckTimeoutMs: 5000,
  },

  platforms: {
    supported: Object.freeze([
      'youtube.com',
      'youtu.be',
      'facebook.com',
      'fb.watch',
      'instagram.com',
      'tiktok.com',
      'twitter.com',
      'x.com',
      'soundcloud.com',
      'vimeo.com',
      'dailymotion.com',
      'bilibili.com',
      'twitch.tv',
      'reddit.com',
      'pinterest.com',
      'linkedin.com',
      'bandcamp.com',
    ]),
    drm: Object.freeze([
      'spotify.com',
      'music.apple.com',
      'music.amazon.com',
      'tidal.com',
      'deezer.com',
    ]),
    loginRestricted: Object.freeze(['facebook.com', 'fb.watch']),
    playlistPatterns: Object.freeze([
      { pattern: 'playlist?list=' },
      { pattern: '/playlist/' },
      { host: 'music.youtube.com', pattern: 'list=' },
      { host: 'soundcloud.com', pattern: '/sets/' },
      { host: 'bandcamp.com', pattern: '/album/' },
    ]),
  },

  logging: {
    // En tests no se escribe archivo y la consola solo muestra errores
    fileLevel: isTest ? false : 'info',
    consoleLevel: isTest ? 'error' : env.MEDIAGRAB_LOG_LEVEL ?? 'info',
    maxSize: 10 * 1024 * 1024,
    retentionDays: 5,
  },
};

export default config;
