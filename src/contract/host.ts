/**
 * Impact Escrow Protocol — Ledger Host
 *
 * In-process stand-in for the chain the contract runs on. It supplies what the
 * contract code may assume from its host:
 *   - a ledger clock (unix seconds, only moves forward)
 *   - atomic transactions: storage is snapshotted before the body runs and
 *     restored if it throws, and events are only published on success
 *   - an append-only event log with subscribers (the indexer/oracle boundary)
 *
 * Subscribers run after the commit. A throwing subscriber is reported through
 * `onListenerError` and cannot fail the call or starve the other subscribers.
 *
 * Transaction bodies are synchronous, so two bodies never interleave.
 */

import type { ProtocolEvent, ProtocolEventBody, ProtocolEventType, EventOf } from '../types/events'
import { ContractStorage } from './storage'

export interface Transaction {
  readonly now: number
  readonly storage: ContractStorage
  emit(event: ProtocolEventBody): void
}

export type EventListener = (event: ProtocolEvent) => void

export type ListenerErrorHandler = (err: unknown, event: ProtocolEvent) => void

export interface LedgerHostOptions {
  timestamp?: number                // Initial ledger time, defaults to wall clock
  onListenerError?: ListenerErrorHandler
}

function reportListenerError(err: unknown, event: ProtocolEvent): void {
  const reason = err instanceof Error ? err.message : String(err)
  console.error(`[IEP] Event listener failed on ${event.type} #${event.sequence}: ${reason}`)
}

export class LedgerHost {
  readonly storage = new ContractStorage()
  private timestamp: number
  private readonly eventLog: ProtocolEvent[] = []
  private readonly listeners = new Set<EventListener>()
  private inTransaction = false
  private readonly onListenerError: ListenerErrorHandler

  constructor(options: LedgerHostOptions = {}) {
    this.timestamp = options.timestamp ?? Math.floor(Date.now() / 1000)
    this.onListenerError = options.onListenerError ?? reportListenerError
  }

  now(): number {
    return this.timestamp
  }

  setTimestamp(timestamp: number): void {
    if (timestamp < this.timestamp) {
      throw new Error(`Ledger time cannot move backwards (${timestamp} < ${this.timestamp})`)
    }
    this.timestamp = timestamp
  }

  advance(seconds: number): number {
    this.setTimestamp(this.timestamp + seconds)
    return this.timestamp
  }

  transact<T>(body: (tx: Transaction) => T): T {
    if (this.inTransaction) {
      throw new Error('Nested transactions are not supported')
    }

    const restore = this.storage.snapshot()
    const pending: ProtocolEvent[] = []
    const timestamp = this.timestamp
    const tx: Transaction = {
      now: timestamp,
      storage: this.storage,
      emit: (event) => {
        pending.push({ ...event, sequence: this.eventLog.length + pending.length + 1, timestamp })
      },
    }

    this.inTransaction = true
    let result: T
    try {
      result = body(tx)
    } catch (err) {
      restore()
      throw err
    } finally {
      this.inTransaction = false
    }

    this.eventLog.push(...pending)
    for (const event of pending) this.publish(event)
    return result
  }

  private publish(event: ProtocolEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (err) {
        this.onListenerError(err, event)
      }
    }
  }

  events(): ProtocolEvent[] {
    return [...this.eventLog]
  }

  eventsOfType<T extends ProtocolEventType>(type: T): EventOf<T>[] {
    return this.eventLog.filter((event): event is EventOf<T> => event.type === type)
  }

  /** Events with a sequence number strictly greater than `sequence` */
  eventsSince(sequence: number): ProtocolEvent[] {
    return this.eventLog.slice(sequence)
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }
}
