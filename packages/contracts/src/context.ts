/**
 * Platform Context Types
 *
 * Shared between the platform (which implements them) and the domain
 * (which consumes them in subscribers).
 */

/**
 * Structured logger.
 * Platform and domain code should use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * A domain event emitted after a runtime operation commits.
 * Platform routes these to the subscribers registered for its type.
 */
export interface DomainEvent {
  /**
   * Event name. Convention: "subject.verb_past_tense"
   * (e.g., "process.started", "task.completed").
   * Transition triggers are emitted under their declared name.
   */
  type: string;

  /** The data associated with this event */
  payload: Record<string, unknown>;

  /** When the event occurred */
  timestamp?: Date;
}

/**
 * An event subscriber: a function that reacts to domain events.
 *
 * Subscribers are registered at startup and receive events that match
 * their declared event type. A failing subscriber never rolls back the
 * operation that emitted the event; the failure is reported as a warning.
 *
 * @example
 * const onTaskCreated: EventSubscriber = {
 *   eventType: "task.created",
 *   name: "NotifyAssignees",
 *   handler: async (event) => {
 *     console.log("New task:", event.payload.step);
 *   },
 * };
 */
export interface EventSubscriber {
  /** The event type to listen for. Supports exact match or wildcard "*" for all events. */
  eventType: string;

  /** Human-readable name for logging and debugging */
  name: string;

  /** The function called when a matching event is emitted */
  handler: (event: DomainEvent) => Promise<void>;
}
