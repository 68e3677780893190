/**
 * Leave Request Process
 *
 * An employee applies for leave and their team lead reviews it.
 * Requests longer than two weeks also need HR.
 */

import { defineProcess } from "@procflow/contracts";

export const LeaveRequestProcess = defineProcess({
  name: "LeaveRequest",
  description: "Apply for leave and have it reviewed.",
  initialState: "Requested",

  entities: [
    {
      name: "LeaveRequest",
      fields: [
        { name: "days", type: "int" },
        { name: "kind", type: "enum", variants: ["annual", "sick", "unpaid"] },
        { name: "paid", type: "boolean" },
      ],
    },
  ],

  roles: [
    { name: "HRManager", supervises: ["TeamLead"] },
    { name: "TeamLead", supervises: ["Employee"] },
    { name: "Employee" },
  ],

  states: [
    { name: "Requested" },
    { name: "Approved" },
    { name: "Declined" },
    { name: "Withdrawn" },
  ],

  transitions: [
    {
      name: "approve",
      from: "Requested",
      to: "Approved",
      by: "TeamLead",
      triggers: ["leave.approved"],
    },
    {
      name: "decline",
      from: "Requested",
      to: "Declined",
      by: "TeamLead",
      requires: ["declineReason"],
    },
    { name: "withdraw", from: "Requested", to: "Withdrawn", by: "Employee" },
  ],

  steps: [
    { name: "Apply", role: "Employee", entity: "LeaveRequest" },
    {
      name: "LeadReview",
      role: "TeamLead",
      entity: "LeaveRequest",
      dependsOn: ["Apply"],
      onComplete: [
        { when: { field: "days", operator: ">", value: 14 }, step: "HRReview" },
        { when: { field: "decision", operator: "==", value: "approve" }, transition: "approve" },
      ],
    },
    {
      name: "HRReview",
      role: "HRManager",
      entity: "LeaveRequest",
      dependsOn: ["LeadReview"],
      onComplete: [
        { when: { field: "decision", operator: "==", value: "approve" }, transition: "approve" },
      ],
    },
  ],

  flow: ["Apply", "LeadReview"],
});
