/**
 * Release catalog backed by the GitHub releases API.
 */

import { z } from "zod";
import type { HttpClient } from "../platform/network.js";
import type { Logger } from "../logging/types.js";
import type { AppConfig } from "../config/types.js";
import { ReleaseCatalogError, getErrorMessage } from "../errors.js";
import type { Version } from "../version-manager/types.js";
import type { ReleaseCatalog, ReleaseChannel, ReleaseEntry } from "./types.js";

const PAGE_SIZE = 100;

const TAG_PATTERN = /^v(\d+)\.(\d+)\.(\d+)\.(\d+)(?:-(.+))?$/;

const releaseSchema = z.object({
  tag_name: z.string(),
  published_at: z.string().nullable(),
  draft: z.boolean().default(false),
});

const releasesPageSchema = z.array(releaseSchema);

/**
 * Parse a release tag such as "v25.12.5.44-stable".
 *
 * @returns Version and channel, or null if the tag does not follow the scheme
 */
export function parseReleaseTag(
  tag: string
): { version: Version; channel: ReleaseChannel } | null {
  const match = TAG_PATTERN.exec(tag);
  if (!match) return null;
  const [, a, b, c, d, suffix] = match;
  const version: Version = [Number(a), Number(b), Number(c), Number(d)];
  if (!version.every(Number.isSafeInteger)) return null;
  const channel: ReleaseChannel =
    suffix === "stable" ? "stable" : suffix === "lts" ? "lts" : "other";
  return { version, channel };
}

/**
 * True if a Link header advertises a next page.
 */
export function hasNextPage(linkHeader: string | null): boolean {
  if (!linkHeader) return false;
  return linkHeader.split(",").some((link) => /;\s*rel="?next"?/.test(link));
}

/**
 * Dependencies for GitHubReleaseCatalog.
 */
export interface GitHubReleaseCatalogDeps {
  readonly httpClient: HttpClient;
  readonly config: Pick<AppConfig, "releasesUrl" | "catalogTimeoutMs" | "maxCatalogPages">;
  readonly logger: Logger;
}

/**
 * Lists releases page by page until the API reports no next page. The
 * configured page limit only bounds a runaway listing; hitting it is logged.
 * No retries.
 */
export class GitHubReleaseCatalog implements ReleaseCatalog {
  private readonly httpClient: HttpClient;
  private readonly config: GitHubReleaseCatalogDeps["config"];
  private readonly logger: Logger;

  constructor(deps: GitHubReleaseCatalogDeps) {
    this.httpClient = deps.httpClient;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  async listReleases(signal?: AbortSignal): Promise<readonly ReleaseEntry[]> {
    const entries: ReleaseEntry[] = [];
    let page = 1;
    for (;;) {
      const { releases, hasNext } = await this.fetchPage(page, signal);
      entries.push(...releases);
      if (!hasNext) break;
      if (page >= this.config.maxCatalogPages) {
        this.logger.warn("Catalog truncated", { pages: page, releases: entries.length });
        break;
      }
      page++;
    }
    this.logger.info("Catalog listed", { releases: entries.length });
    return entries;
  }

  /**
   * URL of one listing page.
   */
  pageUrl(page: number): string {
    const url = new URL(this.config.releasesUrl);
    url.searchParams.set("per_page", String(PAGE_SIZE));
    url.searchParams.set("page", String(page));
    return url.toString();
  }

  private async fetchPage(
    page: number,
    signal: AbortSignal | undefined
  ): Promise<{ releases: ReleaseEntry[]; hasNext: boolean }> {
    const url = this.pageUrl(page);

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, {
        timeout: this.config.catalogTimeoutMs,
        headers: { Accept: "application/vnd.github+json" },
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === "AbortError"
          ? "request timed out or was aborted"
          : getErrorMessage(error);
      throw this.unavailable(url, reason);
    }

    if (!response.ok) {
      throw this.unavailable(url, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw this.unavailable(url, `invalid JSON (${getErrorMessage(error)})`);
    }

    const parsed = releasesPageSchema.safeParse(body);
    if (!parsed.success) {
      throw this.unavailable(url, "unexpected response format");
    }

    const releases: ReleaseEntry[] = [];
    for (const release of parsed.data) {
      const entry = this.toEntry(release);
      if (entry) releases.push(entry);
    }
    const hasNext = hasNextPage(response.headers.get("link"));
    this.logger.debug("Catalog page", {
      page,
      received: parsed.data.length,
      kept: releases.length,
      hasNext,
    });
    return { releases, hasNext };
  }

  private toEntry(release: z.infer<typeof releaseSchema>): ReleaseEntry | null {
    if (release.draft || release.published_at === null) {
      return null;
    }
    const publishedAt = new Date(release.published_at);
    if (Number.isNaN(publishedAt.getTime())) {
      return null;
    }
    const parsedTag = parseReleaseTag(release.tag_name);
    if (!parsedTag) {
      this.logger.silly("Skipping tag", { tag: release.tag_name });
      return null;
    }
    return { ...parsedTag, tag: release.tag_name, publishedAt };
  }

  private unavailable(url: string, reason: string): ReleaseCatalogError {
    this.logger.warn("Catalog request failed", { url, reason });
    return new ReleaseCatalogError(`Release catalog unavailable: ${reason}`);
  }
}

/**
 * Create a GitHubReleaseCatalog instance.
 */
export function createReleaseCatalog(deps: GitHubReleaseCatalogDeps): GitHubReleaseCatalog {
  return new GitHubReleaseCatalog(deps);
}
