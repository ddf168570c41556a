// CHANGE: Library entry re-exporting the audit pipeline and its building blocks.
// WHY: The CLI lives in bin.ts; importing this module has no side effects.

export { runCli, buildProgram } from "./cli.js";
export { runAudit } from "./audit.js";
export { reconcile, reconcileByName, reconcileByTag, coveragePercentage } from "./reconciler.js";
export type { AuditOptions, AuditSummary, ComparisonResult, InventoryItem, RegistryItem } from "./types.js";
