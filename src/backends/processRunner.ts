/**
 * Ejecución de yt-dlp como proceso externo, línea a línea.
 *
 * Lee stdout y stderr con readline. Cada línea pasa primero por `onLine`; las que no
 * consume se acumulan en el texto de su stream. El proceso se termina con SIGTERM en
 * cuanto salta la señal, y la espera de salida tras cerrar la salida está acotada.
 *
 * @module backends/processRunner
 */

import { spawn } from 'child_process';
import type EventEmitter from 'events';
import readline from 'readline';
import type { Readable } from 'stream';
import config from '../config';
import { logger } from '../utils/logger';

const log = logger.child('Process');

export type OutputStream = 'stdout' | 'stderr';

/** Lo mínimo que el runner necesita de un proceso hijo. */
export interface BackendProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnProcess = (_command: string, _args: string[]) => BackendProcess;

export interface RunProcessOptions {
  signal?: AbortSignal;
  /** Devuelve true si la línea quedó consumida (no se acumula). */
  onLine?: (_line: string, _stream: OutputStream) => boolean;
  exitTimeoutMs?: number;
}

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export const spawnProcess: SpawnProcess = (command, args) =>
  spawn(command, args, { shell: false, windowsHide: true });

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Proceso abortado');
}

export function runProcess(
  spawnFn: SpawnProcess,
  command: string,
  args: string[],
  options: RunProcessOptions = {}
): Promise<ProcessResult> {
  const { signal, onLine, exitTimeoutMs = config.backend.processExitTimeoutMs } = options;

  return new Promise<ProcessResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    log.debug(`Ejecutando ${command} ${args.join(' ')}`);
    const child = spawnFn(command, args);

    const output: Record<OutputStream, string[]> = { stdout: [], stderr: [] };
    let openStreams = 2;
    let exitCode: number | null = null;
    let exited = false;
    let settled = false;
    let exitTimer: ReturnType<typeof setTimeout> | null = null;

    const cleanup = (): void => {
      if (exitTimer !== null) clearTimeout(exitTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      cleanup();
      reject(error);
    };

    const maybeFinish = (): void => {
      if (settled || !exited || openStreams > 0) return;
      settled = true;
      cleanup();
      resolve({
        exitCode,
        stdout: output.stdout.join('\n'),
        stderr: output.stderr.join('\n'),
      });
    };

    function onAbort(): void {
      child.kill('SIGTERM');
      if (signal) fail(abortReason(signal));
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    const readLines = (stream: OutputStream, input: Readable): void => {
      const rl = readline.createInterface({ input, crlfDelay: Infinity });
      rl.on('line', line => {
        if (onLine?.(line, stream)) return;
        output[stream].push(line);
      });
      rl.on('close', () => {
        openStreams--;
        if (openStreams === 0 && !exited && exitTimer === null) {
          // Salida cerrada: el proceso tiene un margen acotado para terminar
          exitTimer = setTimeout(() => {
            child.kill('SIGTERM');
            fail(new Error(`${command} no terminó tras cerrar su salida`));
          }, exitTimeoutMs);
        }
        maybeFinish();
      });
    };
    readLines('stdout', child.stdout);
    readLines('stderr', child.stderr);

    child.on('error', (err: NodeJS.ErrnoException) => {
      log.error(`Error ejecutando ${command}:`, err.message);
      if (err.code === 'ENOENT') {
        fail(new Error(`No se encontró el ejecutable ${command} (spawn ENOENT)`));
      } else {
        fail(err);
      }
    });

    child.on('close', (code: number | null) => {
      exited = true;
      exitCode = code;
      maybeFinish();
    });
  });
}

/**
 * Mensaje de error de un proceso fallido: la última línea "ERROR:" de stderr, o stderr
 * completo, o el código de salida.
 */
export function processErrorMessage(command: string, result: ProcessResult): string {
  const lines = result.stderr
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean);
  const errorLine = [...lines].reverse().find(line => line.startsWith('ERROR:'));
  if (errorLine) return errorLine.replace(/^ERROR:\s*/, '');
  if (lines.length > 0) return lines.join(' ');
  return `${command} terminó con código ${result.exitCode ?? 'desconocido'}`;
}

/** Lanza si el proceso no terminó con código 0. */
export function ensureSuccess(command: string, result: ProcessResult): void {
  if (result.exitCode !== 0) {
    throw new Error(processErrorMessage(command, result));
  }
}
