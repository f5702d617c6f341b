/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @spanwise/engine/impl
 */

export { InMemoryEventBus, type InMemoryEventBusConfig } from "./InMemoryEventBus.js";
