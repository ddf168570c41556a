// CHANGE: Sequential audit pipeline shared by both CLI subcommands.
// WHY: Every fatal failure must surface before the first report file is written.

import { authenticate, listProjects, listTaggedRepositories } from "./checkmarx.js";
import { REPORT } from "./config.js";
import { listRepositories } from "./github.js";
import { debug, info } from "./logger.js";
import { coveragePercentage, formatCoverage, reconcileByName, reconcileByTag } from "./reconciler.js";
import { ReportOptions, writeLinesReport, writeRecordsReport } from "./reporter.js";
import { AuditMode, AuditOptions, AuditSummary, ComparisonResult, ReportOutcome } from "./types.js";

/**
 * Collaborators of the pipeline, replaceable in tests.
 */
export interface AuditDependencies {
  readonly listRepositories: typeof listRepositories;
  readonly authenticate: typeof authenticate;
  readonly listProjects: typeof listProjects;
  readonly listTaggedRepositories: typeof listTaggedRepositories;
  readonly writeRecordsReport: typeof writeRecordsReport;
  readonly writeLinesReport: typeof writeLinesReport;
  readonly now: () => Date;
}

export const defaultDependencies: AuditDependencies = {
  listRepositories,
  authenticate,
  listProjects,
  listTaggedRepositories,
  writeRecordsReport,
  writeLinesReport,
  now: () => new Date()
};

interface Reconciled<T> {
  readonly registryCount: number;
  readonly comparison: ComparisonResult<T>;
}

function summarise<T>(
  mode: AuditMode,
  inventoryCount: number,
  reconciled: Reconciled<T>,
  reports: AuditSummary["reports"]
): AuditSummary {
  const matched = reconciled.comparison.matches.length;
  return {
    mode,
    inventoryCount,
    registryCount: reconciled.registryCount,
    matched,
    unmatched: reconciled.comparison.nonMatches.length,
    coverage: coveragePercentage(matched, inventoryCount),
    reports
  };
}

function logCoverage<T>(comparison: ComparisonResult<T>, inventoryCount: number): void {
  debug(`Unmatched repositories: ${comparison.nonMatches.length}`);
  // Throws EmptyInventoryError before anything is written.
  info(formatCoverage(comparison.matches.length, inventoryCount));
}

/**
 * Run one audit: inventory, token exchange, registry, reconciliation, coverage, reports.
 *
 * @throws UpstreamError, MalformedResponseError or EmptyInventoryError; report write
 * failures are returned in `reports` instead.
 */
export async function runAudit(
  mode: AuditMode,
  options: AuditOptions,
  deps: AuditDependencies = defaultDependencies
): Promise<AuditSummary> {
  info(`Starting ${mode} audit for ${options.owner} (requested ${options.projectCount} repositories).`);
  const inventory = await deps.listRepositories(options.owner, options.githubToken, options.projectCount);
  const accessToken = await deps.authenticate(options.checkmarxApiKey);
  // Each report is stamped with the clock reading taken just before it is written.
  const reportOptions = (): ReportOptions => ({ outputDir: options.outputDir, now: deps.now() });

  let found: ReportOutcome;
  let notFound: ReportOutcome;

  if (mode === "by-name") {
    const projects = await deps.listProjects(accessToken);
    const comparison = reconcileByName(inventory, projects);
    logCoverage(comparison, inventory.length);
    found = await deps.writeRecordsReport(comparison.matches, REPORT.FOUND_PREFIX, reportOptions());
    notFound = await deps.writeRecordsReport(comparison.nonMatches, REPORT.NOT_FOUND_PREFIX, reportOptions());
    return summarise(mode, inventory.length, { registryCount: projects.length, comparison }, { found, notFound });
  }

  const tagged = await deps.listTaggedRepositories(accessToken);
  const comparison = reconcileByTag(
    inventory.map(item => item.name),
    tagged
  );
  logCoverage(comparison, inventory.length);
  found = await deps.writeLinesReport(comparison.matches, REPORT.FOUND_PREFIX, reportOptions());
  notFound = await deps.writeLinesReport(comparison.nonMatches, REPORT.NOT_FOUND_PREFIX, reportOptions());
  return summarise(mode, inventory.length, { registryCount: tagged.length, comparison }, { found, notFound });
}
