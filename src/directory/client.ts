import { Value } from "@sinclair/typebox/value";

import { directoryLogger } from "../logger.js";
import {
  DirectoryUnavailableError,
  describeError,
} from "../services/sync/errors.js";
import {
  PATCH_OP_SCHEMA,
  ScimListResponseSchema,
  type ScimPatchOperation,
  type ScimPatchRequest,
  type ScimResourceType,
} from "../types/index.js";

import type { AccessTokenProvider } from "./token.js";
import type { DirectoryConfig } from "../config.js";
import type { DirectoryReader } from "../services/sync/reader.js";
import type { EntityDescriptor, Normalized } from "../services/sync/types.js";

const SCIM_ACCEPT = "application/scim+json, application/json";

export type ScimClientOptions = Pick<
  DirectoryConfig,
  "baseUrl" | "pageSize" | "requestTimeoutMs" | "fetchDeadlineMs"
>;

/**
 * Decide whether another page must be requested.
 * With a declared total the total wins; without one a short page ends the list.
 */
export function hasMorePages(
  nextStartIndex: number,
  pageLength: number,
  requestedCount: number,
  totalResults: number | null | undefined
): boolean {
  if (pageLength === 0) return false;
  if (totalResults !== null && totalResults !== undefined) {
    return nextStartIndex <= totalResults;
  }
  return pageLength >= requestedCount;
}

/**
 * SCIM 2.0 client for the identity directory
 */
export class ScimClient implements DirectoryReader {
  private readonly baseUrl: string;

  constructor(
    private readonly options: ScimClientOptions,
    private readonly tokens: AccessTokenProvider,
    private readonly now: () => number = Date.now
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  /**
   * Send one authenticated request. Transport failures, timeouts and non-2xx
   * answers all surface as DirectoryUnavailableError.
   */
  private async request(
    path: string,
    init: { method?: string; body?: unknown; timeoutMs?: number } = {}
  ): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const method = init.method ?? "GET";
    const token = await this.tokens.getAccessToken();

    const headers: Record<string, string> = {
      Accept: SCIM_ACCEPT,
      Authorization: `Bearer ${token}`,
    };
    if (init.body !== undefined) {
      headers["Content-Type"] = "application/scim+json";
    }

    directoryLogger.debug({ method, url }, "Sending request to directory");

    const startTime = performance.now();
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: AbortSignal.timeout(
          init.timeoutMs ?? this.options.requestTimeoutMs
        ),
      });
    } catch (error) {
      directoryLogger.error(
        { method, url, error: describeError(error) },
        "Directory request failed"
      );
      throw new DirectoryUnavailableError(
        `${method} ${path} failed: ${describeError(error)}`,
        { cause: error }
      );
    }
    const duration = Math.round(performance.now() - startTime);

    directoryLogger.debug(
      {
        method,
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from directory"
    );

    if (!response.ok) {
      if (response.status === 401) {
        this.tokens.invalidate();
      }
      const body = await response.text().catch(() => "");
      directoryLogger.error(
        { method, url, status: response.status, body: body.slice(0, 500) },
        "Directory answered with an error status"
      );
      throw new DirectoryUnavailableError(
        `${method} ${path} failed: ${String(response.status)} ${response.statusText}`,
        { status: response.status }
      );
    }

    return response;
  }

  /**
   * Iterate every resource of a collection, one page at a time.
   * The whole iteration shares one deadline; when it passes the fetch fails.
   */
  async *listResources(resource: ScimResourceType): AsyncGenerator<unknown> {
    const count = this.options.pageSize;
    const deadline = this.now() + this.options.fetchDeadlineMs;
    let startIndex = 1;
    let pages = 0;

    for (;;) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw new DirectoryUnavailableError(
          `Fetching ${resource} exceeded ${String(this.options.fetchDeadlineMs)}ms`
        );
      }

      const path = `/${resource}?startIndex=${String(startIndex)}&count=${String(count)}`;
      const response = await this.request(path, {
        timeoutMs: Math.min(this.options.requestTimeoutMs, remaining),
      });

      let page: unknown;
      try {
        page = await response.json();
      } catch (error) {
        throw new DirectoryUnavailableError(
          `${resource} page at startIndex=${String(startIndex)} is not JSON`,
          { cause: error }
        );
      }

      if (!Value.Check(ScimListResponseSchema, page)) {
        throw new DirectoryUnavailableError(
          `${resource} page at startIndex=${String(startIndex)} is not a SCIM list response`
        );
      }

      const resources = page.Resources ?? [];
      pages++;
      directoryLogger.debug(
        {
          resource,
          startIndex,
          received: resources.length,
          totalResults: page.totalResults,
        },
        "Fetched directory page"
      );

      yield* resources;

      startIndex += resources.length;
      if (!hasMorePages(startIndex, resources.length, count, page.totalResults)) {
        break;
      }
    }

    directoryLogger.info(
      { resource, pages, fetched: startIndex - 1 },
      "Fetched directory collection"
    );
  }

  async *fetchAll<T>(
    descriptor: EntityDescriptor<T>
  ): AsyncGenerator<Normalized<T>> {
    for await (const resource of this.listResources(descriptor.resource)) {
      yield* descriptor.normalize(resource);
    }
  }

  /**
   * PATCH a group with SCIM patch operations
   */
  async patchGroup(
    groupId: string,
    operations: ScimPatchOperation[]
  ): Promise<void> {
    const body: ScimPatchRequest = {
      schemas: [PATCH_OP_SCHEMA],
      Operations: operations,
    };

    directoryLogger.info(
      { groupId, operations: operations.map((operation) => operation.op) },
      "Patching directory group"
    );

    const response = await this.request(
      `/Groups/${encodeURIComponent(groupId)}`,
      { method: "PATCH", body }
    );
    // 204 or a representation of the group; neither is needed
    await response.body?.cancel();
  }
}
