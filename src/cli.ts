#!/usr/bin/env node
/**
 * CLI de mediagrab: descarga una URL (vídeo o playlist) mostrando el progreso.
 *
 *   mediagrab <url> [--video] [-f formato] [-q calidad] [-r resolución] [-c N] [-l N] [-o dir]
 *
 * Ctrl-C cancela la sesión en curso.
 *
 * @module cli
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { INFO_MESSAGES } from '../shared/constants/messages';
import type { SessionOutcome, SessionResult } from '../shared/types';
import { checkFfmpeg } from './backends';
import { createEngine } from './index';
import type { SessionController } from './engines';
import { formatEta, formatSpeed } from './utils/format';
import { cleanOldLogs, configureLogger, logger } from './utils/logger';

const log = logger.child('CLI');

export const USAGE = `Uso: mediagrab <url> [opciones]

  --video                 Descargar vídeo (por defecto: audio)
  -f, --format <fmt>      Formato de audio (mp3, m4a, flac, ...)
  -q, --quality <kbps>    Calidad de audio en kbps o 'lossless'
  -r, --resolution <res>  Resolución de vídeo (720p, 1080p, Best, ...)
      --container <ext>   Contenedor de vídeo (mp4, mkv, webm)
      --subtitles         Descargar subtítulos
      --sub-lang <code>   Idioma de subtítulos
      --embed-subs        Incrustar subtítulos
      --sponsorblock      Eliminar segmentos patrocinados
      --thumbnail         Incrustar miniatura
      --no-metadata       No escribir metadatos
  -c, --concurrency <n>   Descargas simultáneas (1-10)
  -l, --limit <n>         Máximo de elementos de playlist (0 = sin límite)
  -o, --output <dir>      Carpeta de descargas
  -v, --verbose           Log detallado en consola
  -h, --help              Mostrar esta ayuda`;

const optionalInt = z
  .string()
  .regex(/^\d+$/, 'debe ser un número entero')
  .transform(value => Number.parseInt(value, 10))
  .optional();

const cliValuesSchema = z.object({
  video: z.boolean().optional(),
  format: z.string().optional(),
  quality: z.string().optional(),
  resolution: z.string().optional(),
  container: z.string().optional(),
  subtitles: z.boolean().optional(),
  'sub-lang': z.string().optional(),
  'embed-subs': z.boolean().optional(),
  sponsorblock: z.boolean().optional(),
  thumbnail: z.boolean().optional(),
  'no-metadata': z.boolean().optional(),
  concurrency: optionalInt,
  limit: optionalInt,
  output: z.string().optional(),
  verbose: z.boolean().optional(),
  help: z.boolean().optional(),
});

/** Opciones tal como llegan de la línea de comandos; el motor las valida al arrancar. */
export interface CliSessionOptions {
  format: Record<string, string | boolean>;
  concurrency?: number;
  playlistLimit?: number;
  downloadDir?: string;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'download'; url: string; options: CliSessionOptions; verbose: boolean };

export type ParseCliResult =
  | { success: true; command: CliCommand }
  | { success: false; error: string };

export function parseCliArgs(argv: string[]): ParseCliResult {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const values = cliValuesSchema.safeParse(parsed.values);
  if (!values.success) {
    const issue = values.error.issues[0];
    return { success: false, error: `--${issue?.path.join('.') ?? '?'}: ${issue?.message ?? ''}` };
  }
  const v = values.data;
  if (v.help) {
    return { success: true, command: { kind: 'help' } };
  }

  const url = parsed.positionals[0];
  if (!url) {
    return { success: false, error: 'Falta la URL' };
  }

  const format: CliSessionOptions['format'] = { kind: v.video ? 'video' : 'audio' };
  if (v.format !== undefined) format.audioFormat = v.format;
  if (v.quality !== undefined) format.audioQuality = v.quality;
  if (v.resolution !== undefined) format.resolution = v.resolution;
  if (v.container !== undefined) format.videoContainer = v.container;
  if (v.subtitles !== undefined) format.subtitles = v.subtitles;
  if (v['sub-lang'] !== undefined) format.subtitleLanguage = v['sub-lang'];
  if (v['embed-subs'] !== undefined) format.embedSubtitles = v['embed-subs'];
  if (v.sponsorblock !== undefined) format.sponsorBlock = v.sponsorblock;
  if (v.thumbnail !== undefined) format.thumbnail = v.thumbnail;
  if (v['no-metadata']) format.metadata = false;

  const options: CliSessionOptions = { format };
  if (v.concurrency !== undefined) options.concurrency = v.concurrency;
  if (v.limit !== undefined) options.playlistLimit = v.limit;
  if (v.output !== undefined) options.downloadDir = v.output;

  return {
    success: true,
    command: { kind: 'download', url, options, verbose: v.verbose ?? false },
  };
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      video: { type: 'boolean' },
      format: { type: 'string', short: 'f' },
      quality: { type: 'string', short: 'q' },
      resolution: { type: 'string', short: 'r' },
      container: { type: 'string' },
      subtitles: { type: 'boolean' },
      'sub-lang': { type: 'string' },
      'embed-subs': { type: 'boolean' },
      sponsorblock: { type: 'boolean' },
      thumbnail: { type: 'boolean' },
      'no-metadata': { type: 'boolean' },
      concurrency: { type: 'string', short: 'c' },
      limit: { type: 'string', short: 'l' },
      output: { type: 'string', short: 'o' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** Código de salida por resultado: 0 éxito, 1 fallo, 2 fallo parcial, 130 cancelado. */
export function exitCodeFor(outcome: SessionOutcome): number {
  switch (outcome.kind) {
    case 'all_succeeded':
      return 0;
    case 'partial_failure':
      return 2;
    case 'cancelled':
      return 130;
    case 'failed':
      return 1;
  }
}

/** Línea de progreso: porcentaje, velocidad y ETA cuando se conocen. */
export function formatProgressLine(percent: number, speedBps: number, etaSeconds: number | null): string {
  const parts = [`${(percent * 100).toFixed(1)}%`];
  if (speedBps > 0) parts.push(formatSpeed(speedBps));
  const eta = formatEta(etaSeconds);
  if (eta) parts.push(`ETA ${eta}`);
  return parts.join(' | ');
}

function attachConsole(engine: SessionController): () => void {
  let progressShown = false;
  const clearProgress = (): void => {
    if (progressShown) {
      process.stdout.write('\n');
      progressShown = false;
    }
  };

  const unsubscribers = [
    engine.events.subscribe('log', entry => {
      clearProgress();
      if (entry.level === 'error') console.error(entry.message);
      else console.log(entry.message);
    }),
    engine.events.subscribe('progress', snapshot => {
      process.stdout.write(
        `\r${formatProgressLine(snapshot.percent, snapshot.speedBps, snapshot.etaSeconds)}\x1b[K`
      );
      progressShown = true;
    }),
    engine.events.subscribe('sessionFinished', () => clearProgress()),
  ];
  return () => unsubscribers.forEach(unsubscribe => unsubscribe());
}

export async function main(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.success) {
    console.error(parsed.error);
    console.error(USAGE);
    return 64;
  }
  if (parsed.command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const { url, options, verbose } = parsed.command;
  configureLogger(verbose ? { consoleLevel: 'debug' } : { consoleLevel: 'warn' });
  await cleanOldLogs();
  const ffmpeg = await checkFfmpeg();
  if (!ffmpeg.available) {
    log.warn(INFO_MESSAGES.FFMPEG_MISSING);
  }

  const engine = createEngine();
  const detach = attachConsole(engine);

  const started = await engine.startSession(url, options);
  if (!started.success) {
    detach();
    console.error(`${started.code}: ${started.error}`);
    return 1;
  }

  const onSigint = (): void => {
    engine.cancel(started.sessionId);
  };
  process.on('SIGINT', onSigint);

  let result: SessionResult;
  try {
    result = await started.done;
  } finally {
    process.off('SIGINT', onSigint);
    detach();
  }

  const files = engine.getSession()?.items.filter(item => item.filePath !== null) ?? [];
  for (const item of files) {
    log.info(`Archivo: ${item.filePath ?? ''}`);
  }
  return exitCodeFor(result.outcome);
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log.error('Error fatal:', error);
      process.exitCode = 1;
    }
  );
}
