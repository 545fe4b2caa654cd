/**
 * Tipos para la configuración centralizada del motor.
 *
 * La implementación concreta y los valores por defecto están en config.ts.
 */
import type { LogLevel } from '../shared/types';

export interface RetryConfig {
  /** Intentos totales por operación (resolución o descarga de un ítem). */
  maxAttempts: number;
  baseDelaySeconds: number;
  maxDelaySeconds: number;
  /** Longitud máxima del motivo de fallo que se muestra al usuario. */
  errorMessageMaxLength: number;
}

export interface DownloadsConfig {
  defaultConcurrency: number;
  minConcurrency: number;
  maxConcurrency: number;
  /** Tope por ítem; al superarlo el ítem pasa a failed con TIMEOUT. */
  itemTimeoutMs: number;
  /** Separación mínima entre dos arranques de sesión (evita doble clic). */
  minStartIntervalMs: number;
  requiredFreeSpaceMb: number;
  /** Límite de elementos de playlist cuando el usuario no indica otro. */
  defaultPlaylistLimit: number;
  /** Tope de resolución cuando el usuario desactiva el límite (0). */
  fallbackPlaylistLimit: number;
  downloadDir: string;
}

export interface ProgressConfig {
  speedSampleIntervalMs: number;
  /** Fracción mostrada cuando el backend no informa tamaño ni fragmentos. */
  unknownExtentFraction: number;
}

export interface BackendConfig {
  binaryPath: string;
  impersonateTarget: string;
  /** Hosts que exigen la ruta de impersonación (subproceso con --impersonate). */
  impersonationHosts: readonly string[];
  socketTimeoutSeconds: number;
  retries: number;
  fragmentRetries: number;
  concurrentFragments: number;
  /** Espera máxima al cierre del proceso tras terminar de leer stdout. */
  processExitTimeoutMs: number;
  ffmpegPath: string;
  /** Límite para `ffmpeg -version` al arrancar el CLI. */
  ffmpegCheckTimeoutMs: number;
}

export interface PlaylistPattern {
  /** Si se indica, el patrón solo aplica a URLs de ese host. */
  host?: string;
  pattern: string;
}

export interface PlatformsConfig {
  supported: readonly string[];
  drm: readonly string[];
  /** Plataformas donde un error de login/cookie significa contenido restringido. */
  loginRestricted: readonly string[];
  /** Patrones de URL que indican playlist aunque el backend devuelva un único elemento. */
  playlistPatterns: readonly PlaylistPattern[];
}

export interface LoggingConfig {
  fileLevel: LogLevel | false;
  consoleLevel: LogLevel | false;
  maxSize: number;
  retentionDays: number;
}

export interface AppConfig {
  retry: RetryConfig;
  downloads: DownloadsConfig;
  progress: ProgressConfig;
  backend: BackendConfig;
  platforms: PlatformsConfig;
  logging: LoggingConfig;
}
