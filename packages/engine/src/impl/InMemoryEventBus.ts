/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus. A handler that throws is reported to
 * the logger and does not stop delivery to the others.
 *
 * @module @spanwise/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { createConsoleLogger, type EngineLogger } from "../contracts/Logger.js";

export interface InMemoryEventBusConfig {
    /** Receives handler failures (default: console) */
    readonly logger?: EngineLogger;
}

/**
 * In-memory EventBus implementation.
 *
 * - Wildcard subscription ("*" receives every event, after specific handlers)
 * - One-time subscriptions via once()
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("parse:completed", (event) => {
 *     console.log("Parsed:", event.data);
 * });
 *
 * bus.emit(createEvent("parse:completed", { entities: 2 }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: EngineLogger;

    constructor(config: InMemoryEventBusConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("EventBus");
    }

    emit(event: EventPayload): void {
        this.dispatch(event, this.handlers.get(event.type));
        this.dispatch(event, this.handlers.get("*"));
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers subscribed to an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(event: EventPayload, handlers: Set<EventHandler> | undefined): void {
        if (!handlers) {
            return;
        }
        // Copy: once() handlers unsubscribe during delivery
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.reportFailure(event, error));
                }
            }
            catch (error) {
                this.reportFailure(event, error);
            }
        }
    }

    private reportFailure(event: EventPayload, error: unknown): void {
        this.logger.error("Event handler failed", {
            eventType: event.type,
            traceId  : event.traceId,
            error    : error instanceof Error ? error.message : String(error),
        });
    }
}
