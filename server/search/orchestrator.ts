import type { Commission, SearchCriteria, State } from "@shared/schema";
import { ValidationError } from "../errors";
import type { Logger } from "../log";
import type { ReferenceDataCache } from "../reference/reference-cache";
import { searchRequest } from "../upstream/requests";
import type { UpstreamTransport } from "../upstream/transport";
import { normalizeSearchPayload, type NormalizedPage } from "./normalizer";

export interface SearchOrchestratorOptions {
  cache: ReferenceDataCache;
  transport: UpstreamTransport;
  maxPageSize: number;
  /** Base for root-relative document links. */
  documentBaseUrl: string;
  logger: Logger;
}

export class SearchOrchestrator {
  constructor(private readonly options: SearchOrchestratorOptions) {}

  listStates(): Promise<State[]> {
    return this.options.cache.getStates();
  }

  async listCommissions(stateId: string): Promise<Commission[]> {
    const id = stateId.trim();
    if (!id) {
      throw new ValidationError("state_id is required", "state_id");
    }
    return this.options.cache.getCommissions(id);
  }

  /**
   * Runs one search: validates the criteria, resolves names to upstream ids,
   * calls the portal and normalizes what comes back. Every failure surfaces
   * as a `CaseSearchError`.
   */
  async search(criteria: SearchCriteria, signal?: AbortSignal): Promise<NormalizedPage> {
    this.validate(criteria);

    const { cache, transport, logger } = this.options;
    const ids = await cache.resolve(criteria.state, criteria.commission);

    const outcome = await transport.send(searchRequest(criteria, ids), signal);
    if (!outcome.ok) {
      throw outcome.error;
    }

    const normalized = normalizeSearchPayload(
      { kind: criteria.search_kind, ...outcome.payload },
      { page: criteria.page, perPage: criteria.per_page, documentBaseUrl: this.options.documentBaseUrl },
    );

    for (const warning of normalized.warnings) {
      const field = warning.field ?? "row";
      logger.warn(`${criteria.search_kind} search: row ${warning.row} ${field} ${warning.reason}: ${warning.value}`);
    }
    if (!normalized.totalIsExact) {
      logger.info(
        `${criteria.search_kind} search: upstream reported no total; returning lower bound ${normalized.result.total_count}`,
      );
    }

    return normalized;
  }

  private validate(criteria: SearchCriteria): void {
    const required = ["state", "commission", "search_value"] as const;
    for (const field of required) {
      if (!criteria[field].trim()) {
        throw new ValidationError(`${field} must not be empty`, field);
      }
    }

    const { maxPageSize } = this.options;
    if (!Number.isInteger(criteria.page) || criteria.page < 1) {
      throw new ValidationError("page must be at least 1", "page");
    }
    if (!Number.isInteger(criteria.per_page) || criteria.per_page < 1 || criteria.per_page > maxPageSize) {
      throw new ValidationError(`per_page must be between 1 and ${maxPageSize}`, "per_page");
    }

    // ISO calendar dates compare correctly as strings.
    if (criteria.date_from && criteria.date_to && criteria.date_from > criteria.date_to) {
      throw new ValidationError("date_from must not be after date_to", "date_from");
    }
  }
}
