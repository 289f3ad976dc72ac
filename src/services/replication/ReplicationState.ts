/**
 * Replication State
 *
 * Single-writer state carried across cycles by the replication controller:
 * the last target snapshot, what the engine has mirrored, which symbols were
 * already open before the watermark, and which opened events were consumed.
 */

import type { AccountSnapshot, OrderInstruction } from '../../clients/shared/interfaces.js';
import { CHANGE_KINDS, type PositionSide } from '../../config/constants.js';
import { isEffectivelyZero } from '../../utils/math.js';
import type { MirroredPosition, PositionChangeEvent } from './types.js';

export class ReplicationState {
  readonly watermark: number;
  private previous: AccountSnapshot | null = null;
  private mirrored: Map<string, MirroredPosition> = new Map();
  private preexisting: Set<string> = new Set();
  private handledOpens: Set<string> = new Set();
  private closeRejections: Map<string, number> = new Map();
  private recentEvents: PositionChangeEvent[] = [];
  private recentEventsLimit: number;

  constructor(watermark: number, recentEventsLimit: number = 200) {
    this.watermark = watermark;
    this.recentEventsLimit = recentEventsLimit;
  }

  getPrevious(): AccountSnapshot | null {
    return this.previous;
  }

  hasBaseline(): boolean {
    return this.previous !== null;
  }

  /**
   * First snapshot: everything open now predates replication
   */
  recordBaseline(snapshot: AccountSnapshot): void {
    for (const symbol of Object.keys(snapshot.positions)) {
      this.preexisting.add(symbol);
    }
    this.previous = snapshot;
  }

  /**
   * Move the baseline forward once a cycle's events have been handled
   */
  advance(current: AccountSnapshot): void {
    const previous = this.previous;
    const beforeWatermark = current.timestamp < this.watermark;

    for (const symbol of [...this.preexisting]) {
      const now = current.positions[symbol];
      if (!now || isEffectivelyZero(now.size)) {
        // Target closed it; a later open is a new lifecycle
        this.preexisting.delete(symbol);
        continue;
      }
      const before = previous?.positions[symbol];
      if (!beforeWatermark && before && before.side !== now.side) {
        this.preexisting.delete(symbol);
      }
    }

    if (beforeWatermark) {
      for (const symbol of Object.keys(current.positions)) {
        this.preexisting.add(symbol);
      }
    }

    this.previous = current;
  }

  isPreexisting(symbol: string): boolean {
    return this.preexisting.has(symbol);
  }

  getPreexisting(): ReadonlySet<string> {
    return this.preexisting;
  }

  // ============================================
  // Mirrored positions
  // ============================================

  getMirrored(symbol: string): MirroredPosition | undefined {
    return this.mirrored.get(symbol);
  }

  getMirroredPositions(): MirroredPosition[] {
    return [...this.mirrored.values()].sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  mirroredCount(): number {
    return this.mirrored.size;
  }

  /**
   * Apply an accepted order to the mirrored set
   */
  applyFill(instruction: OrderInstruction, side: PositionSide, filledSize: number, at: number): void {
    const existing = this.mirrored.get(instruction.symbol);

    switch (instruction.kind) {
      case CHANGE_KINDS.OPENED:
        this.mirrored.set(instruction.symbol, {
          symbol: instruction.symbol,
          side,
          size: filledSize,
          leverage: instruction.leverage,
          marginMode: instruction.marginMode,
          openedAt: at,
          updatedAt: at,
        });
        break;

      case CHANGE_KINDS.INCREASED:
        if (existing) {
          this.mirrored.set(instruction.symbol, { ...existing, size: existing.size + filledSize, updatedAt: at });
        }
        break;

      case CHANGE_KINDS.DECREASED:
      case CHANGE_KINDS.CLOSED:
        if (existing) {
          const remaining = existing.size - filledSize;
          if (remaining <= 0 || isEffectivelyZero(remaining)) {
            this.forget(instruction.symbol);
          } else {
            this.mirrored.set(instruction.symbol, { ...existing, size: remaining, updatedAt: at });
          }
        }
        break;
    }
  }

  forget(symbol: string): void {
    this.mirrored.delete(symbol);
    this.closeRejections.delete(symbol);
  }

  /**
   * Count a rejected close; returns the consecutive rejections so far
   */
  noteCloseRejected(symbol: string): number {
    const count = (this.closeRejections.get(symbol) ?? 0) + 1;
    this.closeRejections.set(symbol, count);
    return count;
  }

  // ============================================
  // Opened-event bookkeeping
  // ============================================

  isOpenHandled(eventId: string): boolean {
    return this.handledOpens.has(eventId);
  }

  markOpenHandled(eventId: string): void {
    this.handledOpens.add(eventId);
  }

  // ============================================
  // Recent events
  // ============================================

  recordEvent(event: PositionChangeEvent): void {
    this.recentEvents.push(event);
    if (this.recentEvents.length > this.recentEventsLimit) {
      this.recentEvents.splice(0, this.recentEvents.length - this.recentEventsLimit);
    }
  }

  /**
   * Newest first
   */
  getRecentEvents(limit: number): PositionChangeEvent[] {
    return this.recentEvents.slice(-limit).reverse();
  }
}
