// CHANGE: Domain models for the repository/scan-project reconciliation.
// WHY: Both audit modes share these shapes from fetch through report.

/**
 * JSON-like value type used for untrusted response bodies without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Repository entry from the source-control inventory.
 *
 * @property name - Repository name without owner.
 * @property url - Browser URL (`html_url`).
 *
 * Invariant: unique by `name` within one fetch.
 */
export interface InventoryItem {
  readonly name: string;
  readonly url: string;
}

/**
 * Project registered in the scanning platform.
 */
export interface RegistryItem {
  readonly id: string;
  readonly name: string;
}

/**
 * Partition of an inventory into covered and uncovered entries.
 *
 * Invariant: `matches.length + nonMatches.length` equals the inventory size, order follows the
 * inventory, and no entry appears in both.
 */
export interface ComparisonResult<T> {
  readonly matches: readonly T[];
  readonly nonMatches: readonly T[];
}

export type AuditMode = "by-name" | "by-tag";

/**
 * Options shared by both audit subcommands.
 *
 * @property owner - GitHub user or organisation whose repositories are listed.
 * @property githubToken - GitHub token; empty string means anonymous access.
 * @property projectCount - Requested repository count (may be exceeded by up to one page).
 * @property checkmarxApiKey - Checkmarx refresh token exchanged for an access token.
 * @property outputDir - Directory receiving the report files.
 */
export interface AuditOptions {
  readonly owner: string;
  readonly githubToken?: string;
  readonly projectCount: number;
  readonly checkmarxApiKey: string;
  readonly outputDir: string;
}

/**
 * Outcome of one report write. Failures are reported, never thrown.
 */
export type ReportOutcome =
  | { readonly ok: true; readonly path: string; readonly rows: number }
  | { readonly ok: false; readonly prefix: string; readonly reason: string };

/**
 * Result of a completed audit run.
 */
export interface AuditSummary {
  readonly mode: AuditMode;
  readonly inventoryCount: number;
  readonly registryCount: number;
  readonly matched: number;
  readonly unmatched: number;
  readonly coverage: number;
  readonly reports: {
    readonly found: ReportOutcome;
    readonly notFound: ReportOutcome;
  };
}
