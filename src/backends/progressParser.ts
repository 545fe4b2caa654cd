/**
 * Parsers de las líneas de progreso de yt-dlp.
 *
 * - Plantilla estructurada (`--progress-template download:%(progress)j`): una línea JSON
 *   con el diccionario de progreso; se valida con zod.
 * - Salida de texto (`[download]  45.2% of ...`): solo el porcentaje.
 *
 * @module backends/progressParser
 */

import { z } from 'zod';
import type { BackendProgressEvent } from '../engines/types';

const progressLineSchema = z
  .object({
    status: z.string(),
    downloaded_bytes: z.number().nullish(),
    total_bytes: z.number().nullish(),
    total_bytes_estimate: z.number().nullish(),
    fragment_index: z.number().nullish(),
    fragment_count: z.number().nullish(),
    filename: z.string().nullish(),
  })
  .passthrough();

const PERCENT_PATTERN = /(\d+\.?\d*)%/;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/** Convierte una línea JSON de progreso en evento; null si la línea no lo es. */
export function parseProgressTemplateLine(line: string): BackendProgressEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return null;

  const parsed = progressLineSchema.safeParse(parseJson(trimmed));
  if (!parsed.success) return null;

  const data = parsed.data;
  const phase =
    data.status === 'finished' ? 'finished' : data.status === 'downloading' ? 'downloading' : null;
  if (phase === null) return null;

  const event: BackendProgressEvent = {
    phase,
    downloadedBytes: data.downloaded_bytes ?? 0,
  };
  const total = data.total_bytes ?? data.total_bytes_estimate;
  if (total != null && total > 0) event.totalBytes = total;
  if (data.fragment_index != null) event.fragmentIndex = data.fragment_index;
  if (data.fragment_count != null) event.fragmentCount = data.fragment_count;
  if (data.filename) event.filename = data.filename;
  return event;
}

/** Extrae "NN.N%" de una línea de descarga en texto; null si no hay porcentaje. */
export function parsePercentLine(line: string): BackendProgressEvent | null {
  if (!line.toLowerCase().includes('download')) return null;
  const match = PERCENT_PATTERN.exec(line);
  if (!match) return null;

  const percent = Number.parseFloat(match[1]);
  if (!Number.isFinite(percent)) return null;
  const fraction = Math.min(Math.max(percent / 100, 0), 1);
  return {
    phase: fraction >= 1 ? 'finished' : 'downloading',
    downloadedBytes: 0,
    fraction,
  };
}
