/**
 * Backend para plataformas que bloquean clientes que no son navegador (TikTok):
 * yt-dlp con `--impersonate` y progreso en texto.
 *
 * @module backends/ImpersonationBackend
 */

import config from '../config';
import type {
  BackendDownloadOptions,
  BackendDownloadResult,
  BackendProgressEvent,
} from '../engines/types';
import { buildImpersonationArgs, buildImpersonationResolveArgs } from './downloadArgs';
import { ensureSuccess, runProcess } from './processRunner';
import { parsePercentLine } from './progressParser';
import { YtDlpBackend, type YtDlpBackendOptions } from './YtDlpBackend';

export interface ImpersonationBackendOptions extends YtDlpBackendOptions {
  target?: string;
}

export class ImpersonationBackend extends YtDlpBackend {
  override readonly name: string = 'yt-dlp-impersonate';
  private readonly target: string;

  constructor(options: ImpersonationBackendOptions = {}) {
    super(options);
    this.target = options.target ?? config.backend.impersonateTarget;
  }

  protected override resolveArgs(url: string, playlistEnd: number): string[] {
    return buildImpersonationResolveArgs(url, playlistEnd, this.target);
  }

  override async download(
    url: string,
    options: BackendDownloadOptions,
    onProgress: (_event: BackendProgressEvent) => void
  ): Promise<BackendDownloadResult> {
    const result = await runProcess(
      this.spawnProcess,
      this.binaryPath,
      buildImpersonationArgs(url, options, this.target),
      {
        signal: options.signal,
        exitTimeoutMs: this.exitTimeoutMs,
        onLine: line => {
          const event = parsePercentLine(line);
          if (!event) return false;
          onProgress(event);
          return true;
        },
      }
    );
    ensureSuccess(this.binaryPath, result);
    return {};
  }
}

export default ImpersonationBackend;
