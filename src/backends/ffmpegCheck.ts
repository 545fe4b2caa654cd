/**
 * Comprobación de FFmpeg: yt-dlp lo necesita para extraer audio (-x) y para unir
 * vídeo y audio en el contenedor final.
 *
 * @module backends/ffmpegCheck
 */

import config from '../config';
import { logger } from '../utils/logger';
import { runProcess, spawnProcess, type SpawnProcess } from './processRunner';

const log = logger.child('FFmpeg');

export interface FfmpegCheckOptions {
  binaryPath?: string;
  spawnProcess?: SpawnProcess;
  timeoutMs?: number;
}

export interface FfmpegStatus {
  available: boolean;
  /** Primera línea de `ffmpeg -version`, si respondió. */
  version?: string;
}

export async function checkFfmpeg(options: FfmpegCheckOptions = {}): Promise<FfmpegStatus> {
  const {
    binaryPath = config.backend.ffmpegPath,
    spawnProcess: spawnFn = spawnProcess,
    timeoutMs = config.backend.ffmpegCheckTimeoutMs,
  } = options;

  try {
    const result = await runProcess(spawnFn, binaryPath, ['-version'], {
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (result.exitCode !== 0) {
      log.warn(`${binaryPath} -version terminó con código ${String(result.exitCode)}`);
      return { available: false };
    }
    const version = result.stdout.split('\n')[0]?.trim();
    log.info(`FFmpeg disponible: ${version || binaryPath}`);
    return version ? { available: true, version } : { available: true };
  } catch (error) {
    log.warn('FFmpeg no disponible:', error instanceof Error ? error.message : String(error));
    return { available: false };
  }
}
