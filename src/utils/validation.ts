/**
 * @fileoverview Validación de URLs y detección de plataforma.
 * @module validation
 *
 * Normaliza la URL introducida por el usuario, comprueba su formato, y clasifica la
 * plataforma (soportada, con DRM, con login obligatorio, con impersonación, playlist).
 */

import config from '../config';
import { logger } from './logger';

const log = logger.child('Validation');

const URL_PATTERN = /^https?:\/\/[^\s/$.?#].[^\s]*$/i;

export interface ValidationResult<T = unknown> {
  valid: boolean;
  data?: T;
  error?: string;
}

/**
 * Recorta la URL y antepone https:// cuando no trae esquema.
 * Devuelve '' si la entrada está vacía.
 */
export function normalizeUrl(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return '';
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  return `https://${trimmed}`;
}

/** Comprueba el formato http(s)://host/... (sin espacios). */
export function isValidUrl(url: string): boolean {
  if (!url) return false;
  const ok = URL_PATTERN.test(url);
  if (!ok) {
    log.debug('URL rechazada por formato:', url);
  }
  return ok;
}

function includesAny(url: string, hosts: readonly string[]): boolean {
  const lower = url.toLowerCase();
  return hosts.some(host => lower.includes(host));
}

/** Nombre legible de la plataforma ("Youtube", "Soundcloud"...) o null si no es conocida. */
export function detectPlatform(url: string): string | null {
  const lower = url.toLowerCase();
  const match = config.platforms.supported.find(p => lower.includes(p));
  if (!match) return null;
  const name = match.split('.')[0];
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export function isDrmPlatform(url: string): boolean {
  return includesAny(url, config.platforms.drm);
}

export function isLoginRestrictedPlatform(url: string): boolean {
  return includesAny(url, config.platforms.loginRestricted);
}

/** Plataformas que bloquean clientes no-navegador y necesitan la ruta de impersonación. */
export function requiresImpersonation(url: string): boolean {
  return includesAny(url, config.backend.impersonationHosts);
}

/**
 * Heurística por patrón de URL: playlist?list=, /playlist/, music.youtube.com con list=,
 * /sets/ de SoundCloud y /album/ de Bandcamp.
 */
export function isPlaylistUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return config.platforms.playlistPatterns.some(
    ({ host, pattern }) => (host === undefined || lower.includes(host)) && lower.includes(pattern)
  );
}

/**
 * Normaliza y valida la URL de una sesión.
 */
export function validateSessionUrl(input: string): ValidationResult<string> {
  const url = normalizeUrl(input);
  if (!url) {
    return { valid: false, error: 'URL vacía' };
  }
  if (!isValidUrl(url)) {
    return { valid: false, data: url, error: 'Formato de URL inválido' };
  }
  return { valid: true, data: url };
}
