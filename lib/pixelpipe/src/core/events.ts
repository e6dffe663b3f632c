/**
 * Event System - Type-safe pub/sub
 * pixelpipe
 *
 * Pipeline progress events with async handlers
 */

import type { Operation, OperationType, RasterInfo } from '../types.js';
import type { PipelineError } from '../errors.js';
import { logger } from '../utils/logger.js';

// ============ EVENT DEFINITIONS ============

/**
 * All pipeline events with their payload types
 */
export interface PipelineEvents {
  'operation.started': OperationStartedEvent;
  'operation.completed': OperationCompletedEvent;
  'pipeline.completed': PipelineCompletedEvent;
  'pipeline.failed': PipelineFailedEvent;

  // Wildcard - catches all events
  '*': BaseEvent;
}

// ============ EVENT PAYLOADS ============

export interface BaseEvent {
  readonly type: string;
  readonly timestamp: Date;
}

export interface OperationStartedEvent extends BaseEvent {
  type: 'operation.started';
  step: number;
  operation: Operation;
  input: RasterInfo;
}

export interface OperationCompletedEvent extends BaseEvent {
  type: 'operation.completed';
  step: number;
  operation: OperationType;
  output: RasterInfo;
  durationMs: number;
}

export interface PipelineCompletedEvent extends BaseEvent {
  type: 'pipeline.completed';
  steps: number;
  output: RasterInfo;
  durationMs: number;
}

export interface PipelineFailedEvent extends BaseEvent {
  type: 'pipeline.failed';
  step: number;
  operation: OperationType;
  error: PipelineError;
}

// ============ EVENT BUS ============

type EventHandler<T> = (event: T) => void | Promise<void>;
type EventKey = keyof PipelineEvents;

type HandlerSets = {
  [K in EventKey]: Set<EventHandler<PipelineEvents[K]>>;
};

function emptyHandlerSets(): HandlerSets {
  return {
    'operation.started': new Set(),
    'operation.completed': new Set(),
    'pipeline.completed': new Set(),
    'pipeline.failed': new Set(),
    '*': new Set(),
  };
}

/**
 * Type-safe event bus
 */
export class EventBus {
  private readonly handlers: HandlerSets = emptyHandlerSets();
  private readonly onceHandlers: HandlerSets = emptyHandlerSets();

  /**
   * Subscribe to an event; returns the unsubscribe function
   */
  on<K extends EventKey>(
    event: K,
    handler: EventHandler<PipelineEvents[K]>
  ): () => void {
    this.handlers[event].add(handler);
    return () => this.off(event, handler);
  }

  /**
   * Subscribe to the next occurrence of an event only
   */
  once<K extends EventKey>(
    event: K,
    handler: EventHandler<PipelineEvents[K]>
  ): () => void {
    this.onceHandlers[event].add(handler);
    return () => this.off(event, handler);
  }

  off<K extends EventKey>(
    event: K,
    handler: EventHandler<PipelineEvents[K]>
  ): void {
    this.handlers[event].delete(handler);
    this.onceHandlers[event].delete(handler);
  }

  /**
   * Emit and wait for all handlers to complete
   */
  async emit<K extends Exclude<EventKey, '*'>>(
    event: K,
    payload: Omit<PipelineEvents[K], 'timestamp' | 'type'>
  ): Promise<void> {
    const fullPayload = {
      ...payload,
      type: event,
      timestamp: new Date(),
    } as PipelineEvents[K];

    const promises: Promise<void>[] = [];
    const run = <T>(handlers: Iterable<EventHandler<T>>, value: T): void => {
      for (const handler of handlers) {
        promises.push(
          Promise.resolve()
            .then(() => handler(value))
            .catch((error: unknown) => {
              logger.error(`[pixelpipe] Event handler error for "${event}":`, error);
            })
        );
      }
    };

    const once = [...this.onceHandlers[event]];
    this.onceHandlers[event].clear();

    run(this.handlers[event], fullPayload);
    run(once, fullPayload);
    run(this.handlers['*'], fullPayload);

    await Promise.all(promises);
  }
}

/**
 * Create a new event bus
 */
export function createEventBus(): EventBus {
  return new EventBus();
}

