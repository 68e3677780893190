/**
 * Domain Event Subscribers
 *
 * Reactive logic that responds to events published by the process runtime.
 * Each subscriber listens for a specific event type and performs a side effect.
 *
 * Subscribers are registered at startup via the platform's EventBus.
 * They run after the runtime has committed the change. A failing
 * subscriber never undoes it: the runtime records a warning instead.
 *
 *   Transition commits → Event published → Subscriber reacts
 */

import type { EventSubscriber } from "@procflow/contracts";

/**
 * Listens for: "purchase_order.approved" (a declared transition trigger)
 *
 * In production this would notify purchasing or reserve budget.
 */
const onPurchaseOrderApproved: EventSubscriber = {
  eventType: "purchase_order.approved",
  name: "LogPurchaseOrderApproved",
  async handler(event) {
    const { instanceId } = event.payload;
    console.log(`[subscriber] Purchase order ${String(instanceId)} approved`);
  },
};

/**
 * Listens for: "leave.approved"
 */
const onLeaveApproved: EventSubscriber = {
  eventType: "leave.approved",
  name: "LogLeaveApproved",
  async handler(event) {
    const { instanceId } = event.payload;
    console.log(`[subscriber] Leave request ${String(instanceId)} approved, calendar updated`);
  },
};

/**
 * Listens for: "*" (wildcard)
 * Filters to instance lifecycle events and writes an audit line for each.
 */
const auditInstanceLifecycle: EventSubscriber = {
  eventType: "*",
  name: "AuditInstanceLifecycle",
  async handler(event) {
    if (!event.type.startsWith("process.")) return;

    const { instanceId, definitionName } = event.payload;
    console.log(
      `[audit] ${String(definitionName)} ${String(instanceId)}: ${event.type.slice("process.".length)}`
    );
  },
};

/**
 * All domain event subscribers.
 * Registered with the platform's EventBus during bootstrap.
 */
export const eventSubscribers: EventSubscriber[] = [
  onPurchaseOrderApproved,
  onLeaveApproved,
  auditInstanceLifecycle,
];
