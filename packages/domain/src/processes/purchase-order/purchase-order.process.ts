/**
 * Purchase Order Process
 *
 * A requester prepares an order, a manager reviews it. Orders above the
 * signoff limit go to a director before they can be approved.
 *
 * States: Draft → PendingApproval → Approved → Ordered
 *                                 ↘ Rejected
 *         Draft → Cancelled
 */

import { defineProcess } from "@procflow/contracts";

/** Orders above this amount need a director's signoff */
export const SIGNOFF_LIMIT = 10_000;

export const PurchaseOrderProcess = defineProcess({
  name: "PurchaseOrder",
  description: "Request, review and place a purchase order with a supplier.",

  entities: [
    {
      name: "PurchaseOrder",
      fields: [
        { name: "supplier", type: "string" },
        { name: "amount", type: "float" },
        { name: "category", type: "enum", variants: ["goods", "services"] },
      ],
    },
  ],

  roles: [
    { name: "Director", supervises: ["Manager", "Finance"] },
    { name: "Manager", supervises: ["Requester"] },
    { name: "Finance" },
    { name: "Requester" },
  ],

  states: [
    { name: "Draft" },
    { name: "PendingApproval" },
    { name: "Approved" },
    { name: "Rejected" },
    { name: "Ordered" },
    { name: "Cancelled" },
  ],

  transitions: [
    {
      name: "submit",
      from: "Draft",
      to: "PendingApproval",
      by: "Requester",
      requires: ["supplier"],
    },
    { name: "cancel", from: "Draft", to: "Cancelled", by: "Requester" },
    {
      name: "approve",
      from: "PendingApproval",
      to: "Approved",
      by: "Manager",
      triggers: ["purchase_order.approved"],
    },
    { name: "reject", from: "PendingApproval", to: "Rejected", by: "Manager" },
    {
      name: "place",
      from: "Approved",
      to: "Ordered",
      by: "Finance",
      triggers: ["purchase_order.placed"],
    },
  ],

  steps: [
    { name: "Prepare", role: "Requester", entity: "PurchaseOrder" },
    {
      name: "Review",
      role: "Manager",
      entity: "PurchaseOrder",
      dependsOn: ["Prepare"],
      onComplete: [
        { when: { field: "decision", operator: "==", value: "reject" }, transition: "reject" },
        { when: { field: "amount", operator: ">", value: SIGNOFF_LIMIT }, step: "DirectorSignoff" },
        { transition: "approve" },
      ],
    },
    {
      name: "DirectorSignoff",
      role: "Director",
      entity: "PurchaseOrder",
      dependsOn: ["Review"],
      onComplete: [
        { when: { field: "decision", operator: "==", value: "approve" }, transition: "approve" },
        { transition: "reject" },
      ],
    },
    {
      name: "NotifySupplier",
      entity: "PurchaseOrder",
      dependsOn: ["Review"],
      auto: true,
    },
  ],

  // DirectorSignoff runs only when Review activates it
  flow: ["Prepare", "Review", "NotifySupplier"],
});
