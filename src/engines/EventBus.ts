/**
 * Bus de eventos entre el motor y su consumidor (CLI o UI).
 *
 * Emite: log, progress, itemStatus, sessionFinished. Los workers nunca tocan estado de
 * presentación: el SessionController es el único que publica aquí.
 *
 * @module EventBus
 */

import EventEmitter from 'events';
import type {
  ItemStatusType,
  LogEntry,
  LogLevel,
  ProgressSnapshot,
  SessionResult,
} from '../../shared/types';

export interface SessionLogEvent extends LogEntry {
  sessionId: string | null;
}

export interface SessionProgressEvent extends ProgressSnapshot {
  sessionId: string;
  timestamp: number;
}

export interface ItemStatusEvent {
  sessionId: string;
  index: number;
  title: string;
  status: ItemStatusType;
  retryCount: number;
  errorMessage: string;
  timestamp: number;
}

export interface EngineEventMap {
  log: SessionLogEvent;
  progress: SessionProgressEvent;
  itemStatus: ItemStatusEvent;
  sessionFinished: SessionResult;
}

export type EngineEventName = keyof EngineEventMap;

export class EngineEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  /** Suscripción tipada; devuelve la función para desuscribirse. */
  subscribe<K extends EngineEventName>(
    event: K,
    listener: (_payload: EngineEventMap[K]) => void
  ): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  emitLog(sessionId: string | null, level: LogLevel, message: string): void {
    const payload: SessionLogEvent = { sessionId, level, message, timestamp: Date.now() };
    this.emit('log', payload);
  }

  emitProgress(sessionId: string, snapshot: ProgressSnapshot): void {
    const payload: SessionProgressEvent = { sessionId, ...snapshot, timestamp: Date.now() };
    this.emit('progress', payload);
  }

  emitItemStatus(payload: Omit<ItemStatusEvent, 'timestamp'>): void {
    const event: ItemStatusEvent = { ...payload, timestamp: Date.now() };
    this.emit('itemStatus', event);
  }

  emitSessionFinished(result: SessionResult): void {
    this.emit('sessionFinished', result);
  }
}

export default EngineEventBus;
