// CHANGE: Centralise endpoints and runtime settings with environment overrides.
// WHY: Regional Checkmarx tenants and GitHub Enterprise hosts differ only by base URL.

import * as dotenv from "dotenv";

dotenv.config();

function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

/**
 * GitHub inventory settings.
 *
 * Invariant: `PAGE_SIZE` is the largest page the repos endpoint serves.
 */
export const GITHUB = {
  API_URL: stripTrailingSlash(process.env.GITHUB_API_URL ?? "https://api.github.com"),
  PAGE_SIZE: 100
} as const;

/**
 * Checkmarx One identity and AST endpoints.
 */
export const CHECKMARX = {
  TOKEN_URL:
    process.env.CHECKMARX_IAM_URL ??
    "https://deu.iam.checkmarx.net/auth/realms/events-canary/protocol/openid-connect/token",
  AST_URL: stripTrailingSlash(process.env.CHECKMARX_AST_URL ?? "https://deu.ast.checkmarx.net"),
  CLIENT_ID: process.env.CHECKMARX_CLIENT_ID ?? "ast-app",
  GRANT_TYPE: "refresh_token",
  ACCEPT: "application/json; version=1.0",
  PROJECT_LIMIT: 1000,
  REPOSITORY_TAG: "GITHUB_REPOSITORY"
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * `TIMEOUT` of 0 leaves requests without a deadline.
 */
export const NET = {
  TIMEOUT: Math.max(0, parseInteger(process.env.HTTP_TIMEOUT, 0))
} as const;

/**
 * Report file settings.
 */
export const REPORT = {
  OUTPUT_DIR: process.env.REPORT_OUTPUT_DIR ?? ".",
  FOUND_PREFIX: "output-found",
  NOT_FOUND_PREFIX: "output-notfound",
  EXTENSION: ".csv"
} as const;
