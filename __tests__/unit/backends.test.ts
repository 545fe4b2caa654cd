/**
 * Tests unitarios para YtDlpBackend, ImpersonationBackend y BackendRouter con un spawn falso.
 */
import { BackendRouter } from '../../src/backends/BackendRouter';
import { buildResolveArgs } from '../../src/backends/downloadArgs';
import { ImpersonationBackend } from '../../src/backends/ImpersonationBackend';
import { YtDlpBackend } from '../../src/backends/YtDlpBackend';
import type { BackendProgressEvent, MediaBackend } from '../../src/engines/types';
import { createFakeSpawn } from '../helpers/fakeProcess';
import { makeFormat } from '../helpers/fixtures';

const downloadOptions = { format: makeFormat(), downloadDir: '/tmp/descargas' };

describe('YtDlpBackend', () => {
  it('resolve debe lanzar -J --flat-playlist y leer las entradas', async () => {
    const { spawn, calls } = createFakeSpawn(proc => {
      proc.writeStdout(
        JSON.stringify({
          _type: 'playlist',
          title: 'Lista',
          entries: [{ url: 'https://example.com/v/1', title: 'Uno' }],
        })
      );
      proc.exit(0);
    });
    const backend = new YtDlpBackend({ binaryPath: '/opt/yt-dlp', spawnProcess: spawn });

    const media = await backend.resolve('https://example.com/list', { playlistEnd: 25 });

    expect(calls[0].command).toBe('/opt/yt-dlp');
    expect(calls[0].args).toEqual(buildResolveArgs('https://example.com/list', 25));
    expect(media).toEqual({
      typeTag: 'playlist',
      title: 'Lista',
      entries: [{ url: 'https://example.com/v/1', title: 'Uno' }],
    });
  });

  it('download debe emitir progreso estructurado y devolver la ruta impresa', async () => {
    const { spawn } = createFakeSpawn(proc => {
      proc.writeStderr('{"status":"downloading","downloaded_bytes":50,"total_bytes":100}');
      proc.writeStderr('{"status":"finished","downloaded_bytes":100,"total_bytes":100,"filename":"/tmp/descargas/a.webm"}');
      proc.writeStdout('/tmp/descargas/a.mp3');
      proc.exit(0);
    });
    const backend = new YtDlpBackend({ spawnProcess: spawn });
    const events: BackendProgressEvent[] = [];

    const result = await backend.download('https://example.com/v/1', downloadOptions, event =>
      events.push(event)
    );

    expect(events.map(event => [event.phase, event.downloadedBytes])).toEqual([
      ['downloading', 50],
      ['finished', 100],
    ]);
    expect(result).toEqual({ filePath: '/tmp/descargas/a.mp3' });
  });

  it('download debe usar el nombre del progreso si no se imprimió ruta', async () => {
    const { spawn } = createFakeSpawn(proc => {
      proc.writeStderr('{"status":"finished","downloaded_bytes":1,"filename":"/tmp/b.m4a"}');
      proc.exit(0);
    });
    const backend = new YtDlpBackend({ spawnProcess: spawn });

    const result = await backend.download('https://example.com/v/2', downloadOptions, () => {});

    expect(result).toEqual({ filePath: '/tmp/b.m4a' });
  });

  it('download debe rechazar con el mensaje de error de yt-dlp', async () => {
    const { spawn } = createFakeSpawn(proc => {
      proc.writeStderr('ERROR: [youtube] abc: HTTP Error 403: Forbidden');
      proc.exit(1);
    });
    const backend = new YtDlpBackend({ spawnProcess: spawn });

    await expect(
      backend.download('https://example.com/v/1', downloadOptions, () => {})
    ).rejects.toThrow('[youtube] abc: HTTP Error 403: Forbidden');
  });
});

describe('ImpersonationBackend', () => {
  it('debe impersonar y traducir los porcentajes a fracciones', async () => {
    const { spawn, calls } = createFakeSpawn(proc => {
      proc.writeStderr('[download]  10.0% of 5.00MiB');
      proc.writeStderr('[download]  60.5% of 5.00MiB');
      proc.exit(0);
    });
    const backend = new ImpersonationBackend({ spawnProcess: spawn });
    const fractions: number[] = [];

    await backend.download('https://www.tiktok.com/@u/video/1', downloadOptions, event =>
      fractions.push(event.fraction ?? -1)
    );

    expect(calls[0].args.slice(0, 2)).toEqual(['--impersonate', 'chrome']);
    expect(fractions).toHaveLength(2);
    expect(fractions[0]).toBeCloseTo(0.1);
    expect(fractions[1]).toBeCloseTo(0.605);
  });

  it('resolve también debe impersonar', async () => {
    const { spawn, calls } = createFakeSpawn(proc => {
      proc.writeStdout('{"_type":"video","title":"Clip"}');
      proc.exit(0);
    });
    const backend = new ImpersonationBackend({ spawnProcess: spawn, target: 'safari' });

    const media = await backend.resolve('https://www.tiktok.com/@u/video/1', { playlistEnd: 1 });

    expect(calls[0].args.slice(0, 4)).toEqual(['--impersonate', 'safari', '-J', '--flat-playlist']);
    expect(media.entries).toEqual([]);
  });

  it('debe rechazar con el aviso de IP bloqueada', async () => {
    const { spawn } = createFakeSpawn(proc => {
      proc.writeStderr('ERROR: [TikTok] 1: Your IP address is blocked from accessing this post');
      proc.exit(1);
    });
    const backend = new ImpersonationBackend({ spawnProcess: spawn });

    await expect(
      backend.download('https://www.tiktok.com/@u/video/1', downloadOptions, () => {})
    ).rejects.toThrow('Your IP address is blocked');
  });
});

describe('BackendRouter', () => {
  function recordingBackend(name: string, calls: string[]): MediaBackend {
    return {
      name,
      resolve: async url => {
        calls.push(`${name}:resolve:${url}`);
        return { entries: [] };
      },
      download: async url => {
        calls.push(`${name}:download:${url}`);
        return {};
      },
    };
  }

  it('debe enviar TikTok a impersonación y el resto al backend estructurado', async () => {
    const calls: string[] = [];
    const router = new BackendRouter({
      structured: recordingBackend('structured', calls),
      impersonation: recordingBackend('impersonation', calls),
    });

    await router.resolve('https://www.tiktok.com/@u/video/1', { playlistEnd: 1 });
    await router.download('https://www.youtube.com/watch?v=1', downloadOptions, () => {});

    expect(calls).toEqual([
      'impersonation:resolve:https://www.tiktok.com/@u/video/1',
      'structured:download:https://www.youtube.com/watch?v=1',
    ]);
    expect(router.pick('https://vimeo.com/1').name).toBe('structured');
  });
});
