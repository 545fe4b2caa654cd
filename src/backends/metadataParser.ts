/**
 * Interpretación del JSON de `yt-dlp -J --flat-playlist`.
 *
 * @module backends/metadataParser
 */

import { z } from 'zod';
import type { ResolvedEntry, ResolvedMedia } from '../engines/types';

const entrySchema = z
  .object({
    url: z.string().nullish(),
    webpage_url: z.string().nullish(),
    title: z.string().nullish(),
  })
  .passthrough();

const infoSchema = z
  .object({
    _type: z.string().nullish(),
    title: z.string().nullish(),
    entries: z.array(entrySchema.nullable()).nullish(),
  })
  .passthrough();

export function parseResolvedMedia(stdout: string): ResolvedMedia {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout.trim());
  } catch {
    throw new Error('Respuesta de metadatos inválida: no es JSON');
  }

  const parsed = infoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Respuesta de metadatos inválida: ${parsed.error.issues[0]?.message ?? ''}`);
  }

  const info = parsed.data;
  const entries: ResolvedEntry[] = [];
  for (const entry of info.entries ?? []) {
    // Entradas nulas = no disponibles. Con --flat-playlist `url` puede ser de la API del extractor
    if (!entry) continue;
    const url = entry.webpage_url || entry.url;
    if (!url) continue;
    entries.push(entry.title ? { url, title: entry.title } : { url });
  }

  const media: ResolvedMedia = { entries };
  if (info._type) media.typeTag = info._type;
  if (info.title) media.title = info.title;
  return media;
}
