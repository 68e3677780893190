/**
 * @procflow/domain
 *
 * Exports the domain's process definitions and event subscribers.
 * The API server imports this to load the definitions into the platform.
 */

import type { DefinitionDocumentInput, ProcessSourceInput } from "@procflow/contracts";
import { LeaveRequestProcess } from "./processes/leave-request/leave-request.process.js";
import { PurchaseOrderProcess } from "./processes/purchase-order/purchase-order.process.js";
export { eventSubscribers } from "./subscribers/index.js";
export { SIGNOFF_LIMIT } from "./processes/purchase-order/purchase-order.process.js";

/**
 * All process definitions in this domain.
 * Names must be unique across the list.
 */
export const processes: ProcessSourceInput[] = [
  PurchaseOrderProcess,
  LeaveRequestProcess,
];

/**
 * The definition document loaded at startup when no DEFINITIONS_PATH is set.
 */
export const definitionDocument: DefinitionDocumentInput = {
  project: {
    name: "Procflow Demo",
    description: "Example processes for the process runtime",
    version: "1.0.0",
  },
  processes,
};
