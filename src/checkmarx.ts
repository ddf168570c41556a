// CHANGE: Checkmarx One token exchange and project registry queries.
// WHY: Produces the registry side of the coverage comparison.

import { CHECKMARX } from "./config.js";
import { MalformedResponseError } from "./errors.js";
import { debug, info } from "./logger.js";
import { JsonValue, RegistryItem } from "./types.js";
import { getJson, postForm } from "./utils/http.js";
import { asIdentifier, asJsonArray, isRecord } from "./utils/json.js";

function authHeaders(accessToken: string): Record<string, string> {
  return {
    Accept: CHECKMARX.ACCEPT,
    Authorization: `Bearer ${accessToken}`
  };
}

/**
 * Exchange a Checkmarx API key (a refresh token) for a short-lived access token.
 *
 * The token is used once, immediately; it is neither cached nor refreshed.
 *
 * @throws UpstreamError when the identity service rejects the key.
 */
export async function authenticate(apiKey: string): Promise<string> {
  const url = CHECKMARX.TOKEN_URL;
  const response = await postForm<JsonValue>(
    url,
    {
      grant_type: CHECKMARX.GRANT_TYPE,
      client_id: CHECKMARX.CLIENT_ID,
      refresh_token: apiKey
    },
    "authentication"
  );
  const body = response.data;
  if (!isRecord(body) || typeof body.access_token !== "string" || body.access_token.length === 0) {
    throw new MalformedResponseError("authentication", url, "access_token missing");
  }
  debug("Obtained Checkmarx access token.");
  return body.access_token;
}

export function projectsUrl(): string {
  return `${CHECKMARX.AST_URL}/api/projects/`;
}

export function tagsUrl(): string {
  return `${CHECKMARX.AST_URL}/api/projects/tags`;
}

/**
 * List registered projects in a single request of up to 1000 entries.
 *
 * No further pages are requested; larger registries are silently capped.
 */
export async function listProjects(accessToken: string): Promise<RegistryItem[]> {
  const url = projectsUrl();
  const response = await getJson<JsonValue>(url, "registry", {
    headers: authHeaders(accessToken),
    params: { limit: CHECKMARX.PROJECT_LIMIT }
  });
  const body = response.data;
  const entries = isRecord(body) ? asJsonArray(body.projects) : undefined;
  if (entries === undefined) {
    throw new MalformedResponseError("registry", url, "projects array missing");
  }
  const projects = entries.map((raw, index): RegistryItem => {
    const id = isRecord(raw) ? asIdentifier(raw.id) : undefined;
    if (!isRecord(raw) || id === undefined || typeof raw.name !== "string") {
      throw new MalformedResponseError("registry", url, `project #${index} lacks id or name`);
    }
    return { id, name: raw.name };
  });
  info(`Fetched ${projects.length} Checkmarx projects.`);
  return projects;
}

/**
 * List the values recorded under one tag key of the project tag index.
 *
 * A key absent from the index means no project carries it; a non-string value is malformed.
 */
export async function listTaggedRepositories(accessToken: string, tagKey: string = CHECKMARX.REPOSITORY_TAG): Promise<string[]> {
  const url = tagsUrl();
  const response = await getJson<JsonValue>(url, "registry", {
    headers: authHeaders(accessToken)
  });
  const body = response.data;
  if (!isRecord(body)) {
    throw new MalformedResponseError("registry", url, "expected a tag index object");
  }
  const values = body[tagKey];
  if (values === undefined || values === null) {
    info(`No Checkmarx projects carry the ${tagKey} tag.`);
    return [];
  }
  const entries = asJsonArray(values);
  if (entries === undefined) {
    throw new MalformedResponseError("registry", url, `${tagKey} is not a list`);
  }
  const names = entries.map((value, index) => {
    if (typeof value !== "string") {
      throw new MalformedResponseError("registry", url, `${tagKey} value #${index} is not a string`);
    }
    return value;
  });
  info(`Fetched ${names.length} ${tagKey} tag values from Checkmarx.`);
  return names;
}
