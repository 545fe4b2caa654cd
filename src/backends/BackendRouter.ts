/**
 * Elige el backend por URL: impersonación para los hosts de
 * config.backend.impersonationHosts, estructurado para el resto. El motor solo ve un
 * MediaBackend.
 *
 * @module backends/BackendRouter
 */

import type {
  BackendDownloadOptions,
  BackendDownloadResult,
  BackendProgressEvent,
  MediaBackend,
  ResolveOptions,
  ResolvedMedia,
} from '../engines/types';
import { logger } from '../utils/logger';
import { requiresImpersonation } from '../utils/validation';

const log = logger.child('BackendRouter');

export interface BackendRouterOptions {
  structured: MediaBackend;
  impersonation: MediaBackend;
}

export class BackendRouter implements MediaBackend {
  readonly name = 'router';
  private readonly structured: MediaBackend;
  private readonly impersonation: MediaBackend;

  constructor(options: BackendRouterOptions) {
    this.structured = options.structured;
    this.impersonation = options.impersonation;
  }

  pick(url: string): MediaBackend {
    const backend = requiresImpersonation(url) ? this.impersonation : this.structured;
    log.debug(`Backend ${backend.name} para ${url}`);
    return backend;
  }

  resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia> {
    return this.pick(url).resolve(url, options);
  }

  download(
    url: string,
    options: BackendDownloadOptions,
    onProgress: (_event: BackendProgressEvent) => void
  ): Promise<BackendDownloadResult> {
    return this.pick(url).download(url, options, onProgress);
  }
}

export default BackendRouter;
