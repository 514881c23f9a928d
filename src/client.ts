import {
  type EscalationPolicy,
  type FetcherLike,
  type Incident,
  type ListIncidentsQuery,
  type RemoteSchedule,
  type ScheduleDocument,
  type ScheduleGateway,
  type WriteScheduleOptions,
} from "./client.types.js";
import {
  ErrorEnvelopeSchema,
  EscalationPolicyEnvelopeSchema,
  IncidentPageSchema,
  ScheduleEnvelopeSchema,
} from "./client.schemas.js";
import { NetworkError, RemoteApiError, describeError } from "./errors.js";

export type {
  ScheduleGateway,
  ScheduleDocument,
  RemoteSchedule,
  EscalationPolicy,
  Incident,
  ListIncidentsQuery,
  WriteScheduleOptions,
  FetcherLike,
} from "./client.types.js";

export const DEFAULT_API_URL = "https://api.pagerduty.com";

const INCIDENT_PAGE_SIZE = 100;

type QueryValue = string | number | boolean | readonly string[];

const normalizeFetch = (
  fetcher: FetcherLike,
): ((input: string | URL, init?: RequestInit) => Promise<Response>) => {
  if (typeof fetcher === "function") return fetcher;
  return fetcher.fetch.bind(fetcher);
};

const buildQuery = (query: Record<string, QueryValue | undefined>): string => {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      params.append(key, String(value));
      continue;
    }
    for (const item of value) params.append(`${key}[]`, item);
  }
  const encoded = params.toString();
  return encoded ? `?${encoded}` : "";
};

const parseBody = (bodyText: string): unknown => {
  try {
    return JSON.parse(bodyText);
  } catch {
    return bodyText;
  }
};

const toRemoteApiError = (
  method: string,
  path: string,
  status: number,
  bodyText: string,
): RemoteApiError => {
  const data = bodyText ? parseBody(bodyText) : undefined;
  const envelope = ErrorEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    const detail = bodyText ? `: ${bodyText}` : "";
    return new RemoteApiError(`${method} ${path} returned ${status}${detail}`, status, data);
  }

  const { message, errors } = envelope.data.error;
  const parts = [message, ...errors].filter((part): part is string => !!part);
  const detail = parts.length > 0 ? `: ${parts.join("; ")}` : "";
  return new RemoteApiError(`${method} ${path} returned ${status}${detail}`, status, data, errors);
};

/**
 * Options for {@link HttpScheduleGateway}.
 */
export interface HttpScheduleGatewayOptions {
  /** REST API token. */
  token: string;
  /** API root; defaults to {@link DEFAULT_API_URL}. */
  baseUrl?: string;
}

/**
 * {@link ScheduleGateway} backed by the PagerDuty REST API (v2).
 *
 * A thin transport: one HTTP request per call, no retries. Responses are
 * validated against the schemas in `client.schemas.ts`.
 *
 * @category Gateway
 *
 * @example
 * ```typescript
 * const gateway = new HttpScheduleGateway(fetch, { token: process.env.PAGERDUTY_TOKEN ?? "" });
 * const schedule = await gateway.getSchedule("PXXXXXX");
 * ```
 */
export class HttpScheduleGateway implements ScheduleGateway {
  #fetch: (input: string | URL, init?: RequestInit) => Promise<Response>;
  #baseUrl: string;
  #token: string;

  constructor(fetcher: FetcherLike, options: HttpScheduleGatewayOptions) {
    this.#fetch = normalizeFetch(fetcher);
    this.#baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/$/, "");
    this.#token = options.token;
  }

  async createSchedule(doc: ScheduleDocument, options?: WriteScheduleOptions) {
    const body = await this.#request("POST", "/schedules", {
      query: { overflow: options?.overflow ? true : undefined },
      body: { schedule: doc },
    });
    return ScheduleEnvelopeSchema.parse(body).schedule;
  }

  async getSchedule(id: string): Promise<RemoteSchedule> {
    const body = await this.#request("GET", `/schedules/${encodeURIComponent(id)}`);
    return ScheduleEnvelopeSchema.parse(body).schedule;
  }

  async updateSchedule(id: string, doc: ScheduleDocument, options?: WriteScheduleOptions) {
    const body = await this.#request("PUT", `/schedules/${encodeURIComponent(id)}`, {
      query: { overflow: options?.overflow ? true : undefined },
      body: { schedule: doc },
    });
    return ScheduleEnvelopeSchema.parse(body).schedule;
  }

  async deleteSchedule(id: string): Promise<void> {
    await this.#request("DELETE", `/schedules/${encodeURIComponent(id)}`);
  }

  async getEscalationPolicy(id: string): Promise<EscalationPolicy> {
    const body = await this.#request("GET", `/escalation_policies/${encodeURIComponent(id)}`);
    return EscalationPolicyEnvelopeSchema.parse(body).escalation_policy;
  }

  async updateEscalationPolicy(id: string, policy: EscalationPolicy): Promise<EscalationPolicy> {
    const body = await this.#request("PUT", `/escalation_policies/${encodeURIComponent(id)}`, {
      body: { escalation_policy: policy },
    });
    return EscalationPolicyEnvelopeSchema.parse(body).escalation_policy;
  }

  async listOpenIncidents(query: ListIncidentsQuery): Promise<Incident[]> {
    const incidents: Incident[] = [];
    let offset = 0;

    for (;;) {
      const body = await this.#request("GET", "/incidents", {
        query: {
          date_range: query.dateRange,
          statuses: query.statuses,
          team_ids: query.teamIds.length > 0 ? query.teamIds : undefined,
          limit: INCIDENT_PAGE_SIZE,
          offset,
        },
      });
      const page = IncidentPageSchema.parse(body);
      incidents.push(...page.incidents);

      if (!page.more || page.incidents.length === 0) return incidents;
      offset += page.incidents.length;
    }
  }

  async #request(
    method: "GET" | "POST" | "PUT" | "DELETE",
    path: string,
    options: { query?: Record<string, QueryValue | undefined>; body?: unknown } = {},
  ): Promise<unknown> {
    const url = `${this.#baseUrl}${path}${buildQuery(options.query ?? {})}`;
    const headers: Record<string, string> = {
      Accept: "application/vnd.pagerduty+json;version=2",
      Authorization: `Token token=${this.#token}`,
    };
    if (options.body !== undefined) headers["Content-Type"] = "application/json";

    let res: Response;
    try {
      res = await this.#fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      });
    } catch (error) {
      throw new NetworkError(`${method} ${path} failed: ${describeError(error)}`, { cause: error });
    }

    const bodyText = await res.text();
    if (!res.ok) {
      throw toRemoteApiError(method, path, res.status, bodyText);
    }

    return bodyText ? parseBody(bodyText) : undefined;
  }
}
