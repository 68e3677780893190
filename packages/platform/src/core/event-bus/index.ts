/**
 * Event Bus
 *
 * A simple, synchronous-dispatch event bus that routes DomainEvents
 * to registered EventSubscriber handlers.
 *
 * Design principles:
 *   - Subscribers are registered at startup (not dynamically at runtime)
 *   - Events are dispatched asynchronously and failures are collected
 *     (a failing subscriber never breaks the operation that emitted the event)
 *   - Failures are returned to the publisher, which reports them as
 *     side-effect warnings against the emitting instance
 *   - Supports exact match ("task.created") and wildcard ("*") subscriptions
 */

import type { DomainEvent, EventSubscriber } from "@procflow/contracts";

/** A subscriber that rejected while handling an event */
export interface PublishFailure {
  subscriber: string;
  eventType: string;
  error: Error;
}

/** All registered subscribers, keyed by event type */
const subscribers = new Map<string, EventSubscriber[]>();

/**
 * Register an event subscriber.
 * Call this at startup (from the API bootstrap).
 *
 * @param subscriber - The subscriber to register
 */
export function subscribe(subscriber: EventSubscriber): void {
  const existing = subscribers.get(subscriber.eventType) ?? [];
  existing.push(subscriber);
  subscribers.set(subscriber.eventType, existing);
}

/**
 * Register multiple subscribers at once.
 * Convenience wrapper for subscribe().
 */
export function subscribeAll(subs: EventSubscriber[]): void {
  for (const sub of subs) {
    subscribe(sub);
  }
}

/**
 * Publish a domain event to all matching subscribers.
 *
 * Matching rules:
 *   1. Exact match on event type (e.g., "task.created" matches "task.created")
 *   2. Wildcard "*" matches all events
 *
 * All matching handlers are invoked concurrently via Promise.allSettled.
 * Failed handlers never re-throw; they are returned so the publisher can
 * report them.
 *
 * @param event - The domain event to publish
 * @returns One entry per subscriber that failed (empty when all succeeded)
 */
export async function publish(event: DomainEvent): Promise<PublishFailure[]> {
  // Add timestamp if not already set
  const enrichedEvent: DomainEvent = {
    ...event,
    timestamp: event.timestamp ?? new Date(),
  };

  // Collect matching subscribers
  const handlers: EventSubscriber[] = [];

  // Exact match
  const exact = subscribers.get(enrichedEvent.type);
  if (exact) handlers.push(...exact);

  // Wildcard match
  const wildcard = subscribers.get("*");
  if (wildcard) handlers.push(...wildcard);

  if (handlers.length === 0) return [];

  // Execute all handlers concurrently, catching failures
  const results = await Promise.allSettled(
    handlers.map((sub) => sub.handler(enrichedEvent))
  );

  const failures: PublishFailure[] = [];
  results.forEach((result, i) => {
    if (result.status === "rejected") {
      failures.push({
        subscriber: handlers[i].name,
        eventType: enrichedEvent.type,
        error:
          result.reason instanceof Error
            ? result.reason
            : new Error(String(result.reason)),
      });
    }
  });

  return failures;
}

/**
 * Returns the count of registered subscribers (for testing/debugging).
 */
export function getSubscriberCount(): number {
  let count = 0;
  for (const subs of subscribers.values()) {
    count += subs.length;
  }
  return count;
}

/**
 * Clears all registered subscribers.
 * Used for test isolation between tests.
 */
export function clearSubscribers(): void {
  subscribers.clear();
}
