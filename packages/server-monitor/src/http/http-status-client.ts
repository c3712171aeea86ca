/**
 * Best-effort HTTP probes against an instance.
 *
 * Transport and decode failures are logged and reported as "not yet
 * available" so the caller's poll loop simply tries again.
 */

import { Logger } from "@nestjs/common";
import { HTTP_REQUEST_TIMEOUT_MS } from "../constants";
import { toError } from "../errors";
import { RunnerStatusSchema, RunnerStatus } from "../status/runner-status";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpStatusClientOptions {
  fetch?: FetchFn;
  requestTimeoutMs?: number;
}

export class HttpStatusClient {
  private readonly logger = new Logger(HttpStatusClient.name);
  private readonly fetchFn: FetchFn;
  private readonly requestTimeoutMs: number;

  constructor(options: HttpStatusClientOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.requestTimeoutMs = options.requestTimeoutMs ?? HTTP_REQUEST_TIMEOUT_MS;
  }

  /**
   * True iff the endpoint answers 200. The body is always consumed.
   */
  async reachable(url: string): Promise<boolean> {
    try {
      return await this.request(url, async (response) => {
        await response.arrayBuffer();
        return response.status === 200;
      });
    } catch (error) {
      this.logger.warn(`Could not complete request to ${url}: ${toError(error).message}`);
      return false;
    }
  }

  /**
   * Fetch and decode the runner status document, or undefined when it is not
   * available yet.
   */
  async fetchRunnerStatus(url: string): Promise<RunnerStatus | undefined> {
    let body: unknown;
    try {
      body = await this.request(url, async (response): Promise<unknown> => {
        if (response.status !== 200) {
          await response.arrayBuffer();
          throw new Error(`HTTP ${response.status}`);
        }
        return response.json();
      });
    } catch (error) {
      this.logger.warn(`Could not get runner status from ${url}: ${toError(error).message}`);
      return undefined;
    }

    const parsed = RunnerStatusSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.logger.warn(
        `Malformed runner status from ${url}: ${issue.path.join(".")} ${issue.message}`,
      );
      return undefined;
    }
    return parsed.data;
  }

  private async request<T>(url: string, read: (response: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      const response = await this.fetchFn(url, { method: "GET", signal: controller.signal });
      return await read(response);
    } finally {
      clearTimeout(timer);
    }
  }
}
