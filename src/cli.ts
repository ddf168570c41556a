// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Allows verifying option handling without triggering process-wide side effects.

import { Command, InvalidArgumentError, Option } from "commander";
import { AuditDependencies, defaultDependencies, runAudit } from "./audit.js";
import { REPORT } from "./config.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { AuditMode, AuditOptions, AuditSummary } from "./types.js";

/**
 * Raw option values as commander hands them to an action.
 */
export interface AuditCommandOptions {
  readonly githubUserOrOrg: string;
  readonly githubApiKey: string;
  readonly numberOfProjects: number;
  readonly checkmarxApiKey: string;
  readonly outputDir: string;
  readonly logLevel?: string;
}

/**
 * Commander argument parser for `--number-of-projects`.
 *
 * @throws InvalidArgumentError for anything but a non-negative integer.
 */
export function parseProjectCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function toAuditOptions(options: AuditCommandOptions): AuditOptions {
  return {
    owner: options.githubUserOrOrg,
    githubToken: options.githubApiKey.length > 0 ? options.githubApiKey : undefined,
    projectCount: options.numberOfProjects,
    checkmarxApiKey: options.checkmarxApiKey,
    outputDir: options.outputDir
  };
}

function reportLine(label: string, outcome: AuditSummary["reports"]["found"]): string {
  return outcome.ok ? `${label}: ${outcome.path} (${outcome.rows} rows)` : `${label}: not written (${outcome.reason})`;
}

/**
 * Audit entry point shared by both subcommands.
 */
export async function auditAction(
  mode: AuditMode,
  options: AuditCommandOptions,
  deps: AuditDependencies = defaultDependencies
): Promise<AuditSummary> {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
  const summary = await runAudit(mode, toAuditOptions(options), deps);
  info(
    `Audit complete: ${summary.matched} matched, ${summary.unmatched} unmatched, ${summary.registryCount} registry entries.`
  );
  info(reportLine("Found report", summary.reports.found));
  info(reportLine("Not-found report", summary.reports.notFound));
  return summary;
}

function addAuditOptions(command: Command): Command {
  return command
    .requiredOption("--github-user-or-org <name>", "GitHub username or organization name")
    .addOption(
      new Option("--github-api-key <key>", "GitHub API token to access private repos")
        .env("GITHUB_API_KEY")
        .makeOptionMandatory()
    )
    .requiredOption(
      "--number-of-projects <count>",
      "Number of GitHub repositories to compare",
      parseProjectCount
    )
    .addOption(
      new Option("--checkmarx-api-key <key>", "Checkmarx One API key (refresh token)")
        .env("CHECKMARX_API_KEY")
        .makeOptionMandatory()
    )
    .option("--output-dir <dir>", "Directory receiving the CSV reports", REPORT.OUTPUT_DIR)
    .addOption(new Option("--log-level <level>", "Log verbosity").choices(["debug", "info", "error"]));
}

/**
 * Construct commander program with configured commands.
 */
export function buildProgram(deps: AuditDependencies = defaultDependencies): Command {
  const program = new Command();
  program
    .name("scan-coverage")
    .description("Find GitHub repositories that have no matching Checkmarx One project")
    .version("1.0.0");

  addAuditOptions(
    program.command("by-name").description("Match repositories to Checkmarx projects by project name")
  ).action(async (options: AuditCommandOptions) => {
    await auditAction("by-name", options, deps);
  });

  addAuditOptions(
    program.command("by-tag").description("Match repositories against the GITHUB_REPOSITORY project tag")
  ).action(async (options: AuditCommandOptions) => {
    await auditAction("by-tag", options, deps);
  });

  return program;
}

/**
 * Execute CLI with provided argv array. Fatal audit errors set exit code 1.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[], deps: AuditDependencies = defaultDependencies): Promise<void> {
  const program = buildProgram(deps);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trimEnd())
      })
      .parseAsync([...argv]);
  } catch (rawError) {
    const message = rawError instanceof Error ? rawError.message : String(rawError);
    logError(`Audit failed: ${message}`);
    process.exitCode = 1;
  }
}
