/**
 * Session Module
 *
 * - TaskSession: state machine for one job, owns its event bus and worker
 * - SessionEventBus: ordered, replayable, multi-subscriber event delivery
 * - Subscription: one observer's bounded queue with gap markers
 */

export { TaskSession } from './task-session.js';
export type { TaskSessionInit, StopReason } from './task-session.js';

export { SessionEventBus } from './session-event-bus.js';
export type { SessionEventBusOptions } from './session-event-bus.js';

export { Subscription } from './subscription.js';
export type { SubscriptionInit } from './subscription.js';
