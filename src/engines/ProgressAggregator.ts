/**
 * Progreso global, velocidad y ETA a partir de eventos de bytes/fragmentos por ítem.
 *
 * Cada ítem en vuelo guarda su fracción (monótona dentro de su vida) y un ancla de
 * muestreo; la velocidad se recalcula como mucho una vez por `sampleIntervalMs` para no
 * mostrar picos instantáneos. El agregador no sabe nada de reintentos ni de plataformas:
 * solo consume eventos.
 *
 * overall = min((terminados + Σ fracciones en vuelo) / max(total, 1), 1)
 *
 * @module engines/ProgressAggregator
 */

import config from '../config';
import type { ProgressSnapshot } from '../../shared/types';

export interface ItemProgressSample {
  downloadedBytes: number;
  totalBytes?: number;
  fragmentIndex?: number;
  fragmentCount?: number;
  /** Fracción ya calculada por el backend (0..1), usada si no hay bytes ni fragmentos. */
  fraction?: number;
}

interface ItemTrackerEntry {
  fraction: number;
  downloadedBytes: number;
  totalBytes: number | null;
  lastSampleTime: number | null;
  lastSampleBytes: number;
  speedBytesPerSec: number;
}

export interface ProgressAggregatorOptions {
  totalItems?: number;
  sampleIntervalMs?: number;
  unknownExtentFraction?: number;
  now?: () => number;
}

function clampFraction(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(value, 1);
}

export class ProgressAggregator {
  private totalItems: number;
  private readonly sampleIntervalMs: number;
  private readonly unknownExtentFraction: number;
  private readonly now: () => number;
  private finished = new Set<number>();
  private inFlight = new Map<number, ItemTrackerEntry>();

  constructor(options: ProgressAggregatorOptions = {}) {
    this.totalItems = Math.max(0, options.totalItems ?? 0);
    this.sampleIntervalMs = options.sampleIntervalMs ?? config.progress.speedSampleIntervalMs;
    this.unknownExtentFraction =
      options.unknownExtentFraction ?? config.progress.unknownExtentFraction;
    this.now = options.now ?? Date.now;
  }

  get completedItemCount(): number {
    return this.finished.size;
  }

  get totalItemCount(): number {
    return this.totalItems;
  }

  setTotalItems(total: number): void {
    this.totalItems = Math.max(0, total);
  }

  private ensureTracking(index: number): ItemTrackerEntry {
    let entry = this.inFlight.get(index);
    if (!entry) {
      entry = {
        fraction: 0,
        downloadedBytes: 0,
        totalBytes: null,
        lastSampleTime: null,
        lastSampleBytes: 0,
        speedBytesPerSec: 0,
      };
      this.inFlight.set(index, entry);
    }
    return entry;
  }

  /** Registra el arranque de un ítem (fracción 0) para que cuente como en vuelo. */
  startItem(index: number): void {
    if (this.finished.has(index)) return;
    this.ensureTracking(index);
  }

  private fractionOf(sample: ItemProgressSample): number {
    if (sample.totalBytes !== undefined && sample.totalBytes > 0) {
      return clampFraction(sample.downloadedBytes / sample.totalBytes);
    }
    if (
      sample.fragmentCount !== undefined &&
      sample.fragmentCount > 0 &&
      sample.fragmentIndex !== undefined
    ) {
      return clampFraction(sample.fragmentIndex / sample.fragmentCount);
    }
    if (sample.fraction !== undefined) {
      return clampFraction(sample.fraction);
    }
    return this.unknownExtentFraction;
  }

  /**
   * Evento "bytes descargados" de un ítem. Ignorado si el ítem ya terminó.
   */
  recordBytes(index: number, sample: ItemProgressSample): ProgressSnapshot {
    if (this.finished.has(index)) return this.snapshot();

    const entry = this.ensureTracking(index);
    const now = this.now();
    const bytes = Math.max(0, sample.downloadedBytes);

    entry.fraction = Math.max(entry.fraction, this.fractionOf(sample));

    if (entry.lastSampleTime === null || bytes < entry.lastSampleBytes) {
      // Primera muestra o el backend reinició el intento: reanclar sin calcular velocidad
      entry.lastSampleTime = now;
      entry.lastSampleBytes = bytes;
    } else if (now - entry.lastSampleTime >= this.sampleIntervalMs) {
      const seconds = (now - entry.lastSampleTime) / 1000;
      entry.speedBytesPerSec = (bytes - entry.lastSampleBytes) / seconds;
      entry.lastSampleTime = now;
      entry.lastSampleBytes = bytes;
    }

    entry.downloadedBytes = bytes;
    entry.totalBytes =
      sample.totalBytes !== undefined && sample.totalBytes > 0 ? sample.totalBytes : null;

    return this.snapshot();
  }

  /** Fracción actual de un ítem en vuelo (1 si ya terminó, 0 si no se conoce). */
  getItemFraction(index: number): number {
    if (this.finished.has(index)) return 1;
    return this.inFlight.get(index)?.fraction ?? 0;
  }

  /**
   * Evento "ítem terminado" (completado o fallido). Idempotente por índice: el contador
   * de terminados nunca retrocede ni cuenta dos veces el mismo ítem.
   */
  itemFinished(index: number): ProgressSnapshot {
    this.inFlight.delete(index);
    this.finished.add(index);
    return this.snapshot();
  }

  /** Quita un ítem en vuelo sin contarlo como terminado (cancelación). */
  itemAbandoned(index: number): ProgressSnapshot {
    this.inFlight.delete(index);
    return this.snapshot();
  }

  /** Suma de velocidades de los ítems en vuelo (bytes/s). */
  get speedBytesPerSec(): number {
    let speed = 0;
    for (const entry of this.inFlight.values()) {
      speed += entry.speedBytesPerSec;
    }
    return speed;
  }

  snapshot(): ProgressSnapshot {
    let inFlightFraction = 0;
    let remainingBytes = 0;
    let knownTotal = false;
    for (const entry of this.inFlight.values()) {
      inFlightFraction += entry.fraction;
      if (entry.totalBytes !== null) {
        knownTotal = true;
        remainingBytes += Math.max(0, entry.totalBytes - entry.downloadedBytes);
      }
    }

    const percent = Math.min(
      (this.finished.size + inFlightFraction) / Math.max(this.totalItems, 1),
      1
    );
    const speedBps = this.speedBytesPerSec;
    const etaSeconds = speedBps > 0 && knownTotal ? remainingBytes / speedBps : null;

    return { percent, speedBps, etaSeconds };
  }

  reset(totalItems = 0): void {
    this.totalItems = Math.max(0, totalItems);
    this.finished.clear();
    this.inFlight.clear();
  }
}
