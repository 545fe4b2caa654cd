/**
 * Backend estructurado: yt-dlp con progreso JSON por línea.
 *
 * @module backends/YtDlpBackend
 */

import config from '../config';
import type {
  BackendDownloadOptions,
  BackendDownloadResult,
  BackendProgressEvent,
  MediaBackend,
  ResolveOptions,
  ResolvedMedia,
} from '../engines/types';
import { logger } from '../utils/logger';
import { buildDownloadArgs, buildResolveArgs } from './downloadArgs';
import { parseResolvedMedia } from './metadataParser';
import { ensureSuccess, runProcess, spawnProcess, type SpawnProcess } from './processRunner';
import { parseProgressTemplateLine } from './progressParser';

const log = logger.child('YtDlp');

export interface YtDlpBackendOptions {
  binaryPath?: string;
  spawnProcess?: SpawnProcess;
  exitTimeoutMs?: number;
}

export class YtDlpBackend implements MediaBackend {
  readonly name: string = 'yt-dlp';
  protected readonly binaryPath: string;
  protected readonly spawnProcess: SpawnProcess;
  protected readonly exitTimeoutMs: number;

  constructor(options: YtDlpBackendOptions = {}) {
    this.binaryPath = options.binaryPath ?? config.backend.binaryPath;
    this.spawnProcess = options.spawnProcess ?? spawnProcess;
    this.exitTimeoutMs = options.exitTimeoutMs ?? config.backend.processExitTimeoutMs;
  }

  protected resolveArgs(url: string, playlistEnd: number): string[] {
    return buildResolveArgs(url, playlistEnd);
  }

  async resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia> {
    const result = await runProcess(
      this.spawnProcess,
      this.binaryPath,
      this.resolveArgs(url, options.playlistEnd),
      { signal: options.signal, exitTimeoutMs: this.exitTimeoutMs }
    );
    ensureSuccess(this.binaryPath, result);
    const media = parseResolvedMedia(result.stdout);
    log.debug(`Resuelto ${url}: ${media.entries.length} entradas (${media.typeTag ?? 'sin tipo'})`);
    return media;
  }

  async download(
    url: string,
    options: BackendDownloadOptions,
    onProgress: (_event: BackendProgressEvent) => void
  ): Promise<BackendDownloadResult> {
    let printedPath: string | undefined;
    let lastFilename: string | undefined;

    const result = await runProcess(
      this.spawnProcess,
      this.binaryPath,
      buildDownloadArgs(url, options),
      {
        signal: options.signal,
        exitTimeoutMs: this.exitTimeoutMs,
        onLine: (line, stream) => {
          const event = parseProgressTemplateLine(line);
          if (event) {
            if (event.filename) lastFilename = event.filename;
            onProgress(event);
            return true;
          }
          // --print after_move:filepath escribe la ruta final en stdout
          if (stream === 'stdout' && line.trim()) {
            printedPath = line.trim();
            return true;
          }
          return false;
        },
      }
    );
    ensureSuccess(this.binaryPath, result);

    const filePath = printedPath ?? lastFilename;
    return filePath ? { filePath } : {};
  }
}

export default YtDlpBackend;
