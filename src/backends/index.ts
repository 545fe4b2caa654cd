/**
 * Backends de medios sobre yt-dlp.
 *
 * @module backends
 */

import { BackendRouter } from './BackendRouter';
import { ImpersonationBackend } from './ImpersonationBackend';
import { YtDlpBackend, type YtDlpBackendOptions } from './YtDlpBackend';

export { BackendRouter } from './BackendRouter';
export type { BackendRouterOptions } from './BackendRouter';
export { ImpersonationBackend } from './ImpersonationBackend';
export type { ImpersonationBackendOptions } from './ImpersonationBackend';
export { YtDlpBackend } from './YtDlpBackend';
export type { YtDlpBackendOptions } from './YtDlpBackend';
export * from './downloadArgs';
export { checkFfmpeg, type FfmpegCheckOptions, type FfmpegStatus } from './ffmpegCheck';
export { parseResolvedMedia } from './metadataParser';
export { parsePercentLine, parseProgressTemplateLine } from './progressParser';
export {
  ensureSuccess,
  processErrorMessage,
  runProcess,
  spawnProcess,
  type BackendProcess,
  type ProcessResult,
  type RunProcessOptions,
  type SpawnProcess,
} from './processRunner';

/** Router con ambos backends compartiendo binario y spawn. */
export function createDefaultBackend(options: YtDlpBackendOptions = {}): BackendRouter {
  return new BackendRouter({
    structured: new YtDlpBackend(options),
    impersonation: new ImpersonationBackend(options),
  });
}
