/**
 * feedbackscan Events
 *
 * Payloads are typed by ScanEvents. What a scan reports:
 *   connected / closed     adapter lifecycle
 *   catalog                columns read and tuples found (verbose logging)
 *   batch                  the full batch text, emitted before it is executed
 *   no-candidates          nothing qualified; no SQL was sent
 *   run / slow-run         receipt and duration of each run
 *   error                  the normalized ScanError and the stage it came from
 */

import { EventEmitter } from 'events';
import type { ScanEvents } from './types.js';

export class ScanEventEmitter extends EventEmitter {
  on<E extends keyof ScanEvents>(
    event: E,
    listener: (payload: ScanEvents[E]) => void,
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  once<E extends keyof ScanEvents>(
    event: E,
    listener: (payload: ScanEvents[E]) => void,
  ): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  emit<E extends keyof ScanEvents>(
    event: E,
    payload: ScanEvents[E],
  ): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof ScanEvents>(
    event: E,
    listener: (payload: ScanEvents[E]) => void,
  ): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }
}
