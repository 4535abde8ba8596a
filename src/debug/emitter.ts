/**
 * Trace emitter for dispatch decisions.
 *
 * Disabled until `enable()` is called. While enabled every event is stamped
 * with a sequence number and the current car/tick context, handed to the
 * `debug` listeners and kept in a bounded history for later queries.
 */

import { EventEmitter } from 'events';
import type { DebugEvent, DebugContext, EventFilter } from './types.js';

const DEFAULT_HISTORY_LIMIT = 500;

class DebugEmitter extends EventEmitter {
  private _enabled = false;
  private context: DebugContext = {};
  private history: DebugEvent[] = [];
  private seq = 0;

  constructor(private historyLimit = DEFAULT_HISTORY_LIMIT) {
    super();
  }

  enable(): void {
    this._enabled = true;
  }

  disable(): void {
    this._enabled = false;
  }

  isEnabled(): boolean {
    return this._enabled;
  }

  /**
   * Merge into the context stamped on subsequent events.
   */
  setContext(ctx: DebugContext): void {
    this.context = { ...this.context, ...ctx };
  }

  getContext(): DebugContext {
    return { ...this.context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Emit a trace event. Returns false without doing anything while disabled.
   */
  emitDebug(type: string, source: string, data: Record<string, unknown>): boolean {
    if (!this._enabled) {
      return false;
    }

    const event: DebugEvent = {
      seq: ++this.seq,
      timestamp: Date.now(),
      type,
      source,
      data,
    };
    if (this.context.carId !== undefined) {
      event.carId = this.context.carId;
    }
    if (this.context.tick !== undefined) {
      event.tick = this.context.tick;
    }

    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.shift();
    }

    this.emit('debug', event);
    return true;
  }

  /**
   * Retained events, oldest first, optionally narrowed by a filter.
   */
  recent(filter: EventFilter = {}): DebugEvent[] {
    return this.history.filter((event) => matchesFilter(event, filter));
  }

  setHistoryLimit(limit: number): void {
    this.historyLimit = Math.max(0, limit);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(this.history.length - this.historyLimit);
    }
  }

  /**
   * Drop history and context and restart numbering. Listeners stay attached.
   */
  reset(): void {
    this.history = [];
    this.seq = 0;
    this.context = {};
  }

  onDebug(handler: (event: DebugEvent) => void): void {
    this.on('debug', handler);
  }

  offDebug(handler: (event: DebugEvent) => void): void {
    this.off('debug', handler);
  }
}

export function matchesFilter(event: DebugEvent, filter: EventFilter): boolean {
  if (filter.type && !event.type.startsWith(filter.type)) {
    return false;
  }
  if (filter.source && event.source !== filter.source) {
    return false;
  }
  if (filter.carId !== undefined && event.carId !== filter.carId) {
    return false;
  }
  if (filter.sinceTick !== undefined && (event.tick === undefined || event.tick < filter.sinceTick)) {
    return false;
  }
  return true;
}

export const debugEmitter = new DebugEmitter();
