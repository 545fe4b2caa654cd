/**
 * Tests unitarios para src/backends/processRunner.ts
 */
import {
  ensureSuccess,
  processErrorMessage,
  runProcess,
} from '../../src/backends/processRunner';
import { createFakeSpawn } from '../helpers/fakeProcess';

describe('runProcess', () => {
  it('debe recoger stdout y stderr por líneas y el código de salida', async () => {
    const { spawn, calls } = createFakeSpawn(proc => {
      proc.writeStdout('uno');
      proc.writeStdout('dos');
      proc.writeStderr('aviso');
      proc.exit(0);
    });

    const result = await runProcess(spawn, 'yt-dlp', ['--version']);

    expect(result).toEqual({ exitCode: 0, stdout: 'uno\ndos', stderr: 'aviso' });
    expect(calls[0].command).toBe('yt-dlp');
    expect(calls[0].args).toEqual(['--version']);
  });

  it('las líneas consumidas por onLine no deben acumularse', async () => {
    const seen: string[] = [];
    const { spawn } = createFakeSpawn(proc => {
      proc.writeStdout('progreso 1');
      proc.writeStdout('resultado');
      proc.writeStderr('progreso 2');
      proc.exit(0);
    });

    const result = await runProcess(spawn, 'yt-dlp', [], {
      onLine: (line, stream) => {
        if (!line.startsWith('progreso')) return false;
        seen.push(`${stream}:${line}`);
        return true;
      },
    });

    expect(seen).toEqual(['stdout:progreso 1', 'stderr:progreso 2']);
    expect(result.stdout).toBe('resultado');
    expect(result.stderr).toBe('');
  });

  it('debe matar el proceso y rechazar al abortar la señal', async () => {
    const controller = new AbortController();
    const { spawn, calls } = createFakeSpawn();

    const pending = runProcess(spawn, 'yt-dlp', [], { signal: controller.signal });
    controller.abort(new Error('cancelado'));

    await expect(pending).rejects.toThrow('cancelado');
    expect(calls[0].process.killedWith).toBe('SIGTERM');
  });

  it('no debe lanzar el proceso si la señal ya está abortada', async () => {
    const controller = new AbortController();
    controller.abort();
    const { spawn, calls } = createFakeSpawn();

    await expect(runProcess(spawn, 'yt-dlp', [], { signal: controller.signal })).rejects.toThrow();
    expect(calls).toHaveLength(0);
  });

  it('debe acotar la espera de salida tras cerrar stdout', async () => {
    const { spawn, calls } = createFakeSpawn(proc => proc.endStreams());

    await expect(runProcess(spawn, 'yt-dlp', [], { exitTimeoutMs: 20 })).rejects.toThrow(
      'yt-dlp no terminó tras cerrar su salida'
    );
    expect(calls[0].process.killedWith).toBe('SIGTERM');
  });

  it('debe explicar un ejecutable ausente', async () => {
    const { spawn } = createFakeSpawn(proc => {
      proc.emit('error', Object.assign(new Error('spawn yt-dlp ENOENT'), { code: 'ENOENT' }));
    });

    await expect(runProcess(spawn, 'yt-dlp', [])).rejects.toThrow(
      'No se encontró el ejecutable yt-dlp (spawn ENOENT)'
    );
  });
});

describe('processErrorMessage', () => {
  it('debe preferir la última línea ERROR:', () => {
    const message = processErrorMessage('yt-dlp', {
      exitCode: 1,
      stdout: '',
      stderr: 'WARNING: algo\nERROR: primero\nERROR: [youtube] abc: Private video',
    });
    expect(message).toBe('[youtube] abc: Private video');
  });

  it('sin línea ERROR: debe unir stderr', () => {
    expect(
      processErrorMessage('yt-dlp', { exitCode: 2, stdout: '', stderr: 'a\n\n  b  ' })
    ).toBe('a b');
  });

  it('sin stderr debe usar el código de salida', () => {
    expect(processErrorMessage('yt-dlp', { exitCode: 1, stdout: '', stderr: '' })).toBe(
      'yt-dlp terminó con código 1'
    );
  });

  it('ensureSuccess solo debe lanzar con código distinto de 0', () => {
    expect(() => ensureSuccess('yt-dlp', { exitCode: 0, stdout: '', stderr: '' })).not.toThrow();
    expect(() =>
      ensureSuccess('yt-dlp', { exitCode: 1, stdout: '', stderr: 'ERROR: HTTP Error 403' })
    ).toThrow('HTTP Error 403');
  });
});
