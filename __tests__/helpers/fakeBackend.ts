/**
 * Backend de medios en memoria para probar el motor sin yt-dlp ni red.
 */
import type {
  BackendDownloadOptions,
  BackendDownloadResult,
  BackendProgressEvent,
  MediaBackend,
  ResolveOptions,
  ResolvedMedia,
} from '../../src/engines/types';

export type ResolveBehavior = (_url: string, _options: ResolveOptions) => Promise<ResolvedMedia>;

export type DownloadBehavior = (
  _url: string,
  _options: BackendDownloadOptions,
  _onProgress: (_event: BackendProgressEvent) => void
) => Promise<BackendDownloadResult>;

export interface FakeBackendOptions {
  resolve?: ResolveBehavior;
  download?: DownloadBehavior;
}

export class FakeBackend implements MediaBackend {
  readonly name = 'fake';
  readonly resolveCalls: Array<{ url: string; playlistEnd: number }> = [];
  readonly downloadCalls: string[] = [];
  private readonly resolveBehavior: ResolveBehavior;
  private readonly downloadBehavior: DownloadBehavior;

  constructor(options: FakeBackendOptions = {}) {
    this.resolveBehavior = options.resolve ?? (async () => ({ entries: [] }));
    this.downloadBehavior =
      options.download ?? (async url => ({ filePath: `/tmp/${url.split('/').pop() ?? 'x'}.mp3` }));
  }

  resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia> {
    this.resolveCalls.push({ url, playlistEnd: options.playlistEnd });
    return this.resolveBehavior(url, options);
  }

  download(
    url: string,
    options: BackendDownloadOptions,
    onProgress: (_event: BackendProgressEvent) => void
  ): Promise<BackendDownloadResult> {
    this.downloadCalls.push(url);
    return this.downloadBehavior(url, options, onProgress);
  }
}

/** Promesa que solo rechaza cuando la señal se aborta (descarga colgada). */
export function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(new Error('abortado'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('abortado')), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Lista de entradas https://example.com/v/1..n con títulos "Vídeo N". */
export function playlistOf(count: number): ResolvedMedia {
  return {
    typeTag: 'playlist',
    title: 'Lista de prueba',
    entries: Array.from({ length: count }, (_, i) => ({
      url: `https://example.com/v/${i + 1}`,
      title: `Vídeo ${i + 1}`,
    })),
  };
}

/** Número final de https://example.com/v/N. */
export function indexOfUrl(url: string): number {
  return Number.parseInt(url.split('/').pop() ?? '0', 10);
}
