// CHANGE: Page through the GitHub repository listing of a user or organisation.
// WHY: Produces the inventory side of the coverage comparison.

import { GITHUB } from "./config.js";
import { MalformedResponseError } from "./errors.js";
import { debug, info } from "./logger.js";
import { InventoryItem, JsonValue } from "./types.js";
import { getJson } from "./utils/http.js";
import { asJsonArray, isRecord } from "./utils/json.js";

export function repositoriesUrl(owner: string): string {
  return `${GITHUB.API_URL}/users/${encodeURIComponent(owner)}/repos`;
}

function toInventoryPage(body: JsonValue, url: string): InventoryItem[] {
  const entries = asJsonArray(body);
  if (entries === undefined) {
    throw new MalformedResponseError("inventory", url, "expected an array of repositories");
  }
  return entries.map((raw, index) => {
    if (!isRecord(raw) || typeof raw.name !== "string" || typeof raw.html_url !== "string") {
      throw new MalformedResponseError("inventory", url, `repository #${index} lacks name or html_url`);
    }
    return { name: raw.name, url: raw.html_url };
  });
}

/**
 * Fetch repositories for a GitHub user or organisation, 100 per page starting at page 1.
 *
 * Paging stops on the first short page or once at least `count` repositories are collected.
 * The result is not truncated to `count`, so it may hold up to one extra page.
 * Duplicate names keep their first occurrence.
 *
 * @param owner - GitHub user or organisation name.
 * @param token - Optional token sent as `Authorization: token <token>`.
 * @param count - Requested number of repositories.
 * @throws UpstreamError on the first non-2xx page.
 */
export async function listRepositories(owner: string, token: string | undefined, count: number): Promise<InventoryItem[]> {
  const url = repositoriesUrl(owner);
  const headers: Record<string, string> = {};
  if (token) {
    headers.Authorization = `token ${token}`;
  }

  const collected: InventoryItem[] = [];
  let page = 1;
  while (collected.length < count) {
    const response = await getJson<JsonValue>(url, "inventory", {
      headers,
      params: { per_page: GITHUB.PAGE_SIZE, page }
    });
    const items = toInventoryPage(response.data, url);
    collected.push(...items);
    debug(`Repository page ${page}: ${items.length} items (${collected.length} total)`);
    if (items.length < GITHUB.PAGE_SIZE || collected.length >= count) {
      break;
    }
    page += 1;
  }

  const byName = new Map<string, InventoryItem>();
  for (const item of collected) {
    if (!byName.has(item.name)) {
      byName.set(item.name, item);
    }
  }
  const repositories = Array.from(byName.values());
  info(`Fetched ${repositories.length} repositories for ${owner} across ${count > 0 ? page : 0} page(s).`);
  return repositories;
}
