/**
 * @fileoverview Utilidades de sistema de archivos: directorio de descargas, espacio libre y
 * limpieza de miniaturas.
 * @module fileHelpers
 */

import { promises as fsPromises } from 'fs';
import path from 'path';
import { logger } from './logger';

const log = logger.child('FileUtils');

const MB = 1024 * 1024;

export interface ValidateDiskSpaceResult {
  valid: boolean;
  available: number | null;
  required: number;
  error?: string;
}

/** Crea el directorio (y padres) si no existe. Devuelve false si no se pudo. */
export async function ensureDirectoryExists(dirPath: string): Promise<boolean> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
    return true;
  } catch (error) {
    log.error(
      'No se pudo crear el directorio:',
      dirPath,
      errorText(error)
    );
    return false;
  }
}

/**
 * Espacio libre en bytes para la ruta dada vía fs.statfs. Si la ruta no existe se sube
 * hasta el primer directorio existente. Devuelve null si no se puede determinar.
 */
export async function getAvailableDiskSpace(directoryPath: string): Promise<number | null> {
  let dirToCheck = path.resolve(directoryPath);
  const root = path.parse(dirToCheck).root;

  try {
    while (dirToCheck !== root) {
      try {
        await fsPromises.access(dirToCheck);
        break;
      } catch {
        dirToCheck = path.dirname(dirToCheck);
      }
    }
    const stats = await fsPromises.statfs(dirToCheck);
    if (stats.bsize > 0 && stats.bavail >= 0) {
      return stats.bsize * stats.bavail;
    }
    return null;
  } catch (error) {
    log.warn('Error obteniendo espacio en disco:', errorText(error));
    return null;
  }
}

/**
 * Comprueba que haya al menos requiredMb libres en el directorio de descargas (lo crea si falta).
 * Si el espacio no se puede medir se asume suficiente.
 */
export async function validateDiskSpace(
  directoryPath: string,
  requiredMb: number
): Promise<ValidateDiskSpaceResult> {
  const required = requiredMb * MB;
  await ensureDirectoryExists(directoryPath);
  const available = await getAvailableDiskSpace(directoryPath);
  if (available === null) {
    log.warn(`No se pudo medir el espacio libre en ${directoryPath}; se asume suficiente`);
    return { valid: true, available, required };
  }
  if (available < required) {
    return {
      valid: false,
      available,
      required,
      error: `Se necesitan ${requiredMb} MB libres`,
    };
  }
  return { valid: true, available, required };
}

/**
 * Borra las miniaturas .webp sueltas que deja la incrustación de carátulas. Con `sinceMs`
 * solo toca archivos modificados desde ese instante. Devuelve cuántos se borraron.
 */
export async function cleanupThumbnails(directoryPath: string, sinceMs?: number): Promise<number> {
  let files: string[];
  try {
    files = await fsPromises.readdir(directoryPath);
  } catch (error) {
    log.warn('No se pudo listar el directorio de descargas:', directoryPath, errorText(error));
    return 0;
  }

  let removed = 0;
  for (const file of files) {
    if (!file.toLowerCase().endsWith('.webp')) continue;
    const filePath = path.join(directoryPath, file);
    try {
      if (sinceMs !== undefined) {
        const stats = await fsPromises.stat(filePath);
        if (stats.mtimeMs < sinceMs) continue;
      }
      await fsPromises.unlink(filePath);
      removed++;
    } catch (error) {
      log.warn('No se pudo borrar la miniatura:', filePath, errorText(error));
    }
  }
  if (removed > 0) {
    log.info(`Miniaturas sueltas eliminadas: ${removed}`);
  }
  return removed;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
