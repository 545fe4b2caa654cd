/**
 * @fileoverview Sistema de logging centralizado del motor (electron-log, variante Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child), formato de objetos, operaciones cronometradas
 * por scope y limpieza de archivos antiguos. Los niveles iniciales salen de config.logging.
 */

import log from 'electron-log/node';
import type { LevelOption } from 'electron-log';
import path from 'path';
import { promises as fs } from 'fs';
import config from '../config';

export type { LogLevel } from '../../shared/types';

export interface ConfigureLoggerOptions {
  fileLevel?: LevelOption;
  consoleLevel?: LevelOption;
  maxSize?: number;
}

log.transports.file.level = config.logging.fileLevel;
log.transports.console.level = config.logging.consoleLevel;

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

type LogMethod = 'error' | 'warn' | 'info' | 'debug';

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  object: (_label: string, _obj: unknown) => void;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogMethod) =>
    (...args: unknown[]): void => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    debug: logMethod('debug'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.info(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    object(label: string, obj: unknown) {
      baseChildLog.info(`${label}:\n${formatObject(obj)}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura formatos, tamaño y niveles de los transports (archivo y consola).
 * Por defecto respeta config.logging; el CLI lo llama al arrancar.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): typeof log {
  const {
    fileLevel = config.logging.fileLevel,
    consoleLevel = config.logging.consoleLevel,
    maxSize = config.logging.maxSize,
  } = options;

  log.transports.file.level = fileLevel;
  log.transports.file.maxSize = maxSize;
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';

  log.transports.console.level = consoleLevel;
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

  if (fileLevel !== false) {
    log.info(`Archivo de log: ${getLogFilePath() ?? 'No disponible'}`);
  }
  return log;
}

/** Ruta absoluta del archivo de log actual, o null si no está configurado. */
export function getLogFilePath(): string | null {
  const file = log.transports.file.getFile();
  return file?.path ?? null;
}

/** Directorio donde se escriben los archivos de log, o null. */
export function getLogDirectory(): string | null {
  const filePath = getLogFilePath();
  return filePath ? path.dirname(filePath) : null;
}

/**
 * Elimina archivos .log del directorio de logs más antiguos que daysToKeep días.
 */
export async function cleanOldLogs(daysToKeep = config.logging.retentionDays): Promise<number> {
  const logDir = getLogDirectory();
  if (!logDir) {
    log.warn('No se pudo obtener el directorio de logs');
    return 0;
  }
  let removed = 0;
  try {
    const files = await fs.readdir(logDir);
    const now = Date.now();
    const maxAge = daysToKeep * 24 * 60 * 60 * 1000;
    for (const file of files) {
      if (!file.endsWith('.log')) continue;
      const filePath = path.join(logDir, file);
      const stats = await fs.stat(filePath);
      if (now - stats.mtime.getTime() > maxAge) {
        await fs.unlink(filePath);
        removed++;
        log.info(`Log antiguo eliminado: ${file}`);
      }
    }
  } catch (error) {
    log.error('Error limpiando logs antiguos:', error);
  }
  return removed;
}

export interface LoggerInstance {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  child: (_scope: string) => ScopedLogger;
}

export const logger: LoggerInstance = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
};

