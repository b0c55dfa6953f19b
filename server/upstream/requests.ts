import type { SearchCriteria, SearchKind } from "@shared/schema";
import type { UpstreamRequest } from "./transport";

// Internal endpoints of the upstream portal. The search form page doubles as
// the source of the state dropdown.
export const STATES_PATH = "/daily_order_search/";
export const COMMISSIONS_PATH = "/get_commissions/";
export const SEARCH_PATH = "/daily_order_search/results/";

export const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  DNT: "1",
} as const;

/** Form field carrying `search_value` for each search kind. */
export const SEARCH_VALUE_PARAMS: Readonly<Record<SearchKind, string>> = {
  case_number: "case_no",
  complainant: "complainant_name",
  respondent: "respondent_name",
  complainant_advocate: "complainant_advocate_name",
  respondent_advocate: "respondent_advocate_name",
  industry_type: "industry_type",
  judge: "judge_name",
};

export interface ResolvedIds {
  stateId: string;
  commissionId: string;
}

export function statesRequest(): UpstreamRequest {
  return {
    method: "GET",
    path: STATES_PATH,
    label: "states",
    context: { entity: "states", subject: "the upstream portal" },
  };
}

export function commissionsRequest(stateId: string): UpstreamRequest {
  return {
    method: "POST",
    path: COMMISSIONS_PATH,
    form: { state_id: stateId },
    label: `commissions of state ${stateId}`,
    context: { entity: "commissions", subject: `state ID: ${stateId}` },
  };
}

export function searchRequest(criteria: SearchCriteria, ids: ResolvedIds): UpstreamRequest {
  const form: Record<string, string> = {
    state_id: ids.stateId,
    commission_id: ids.commissionId,
    search_type: criteria.search_kind,
    [SEARCH_VALUE_PARAMS[criteria.search_kind]]: criteria.search_value.trim(),
    page: String(criteria.page),
    per_page: String(criteria.per_page),
  };

  // Only the case-number search form has a filing date window.
  if (criteria.search_kind === "case_number") {
    if (criteria.date_from) form.from_date = criteria.date_from;
    if (criteria.date_to) form.to_date = criteria.date_to;
  }

  return {
    method: "POST",
    path: SEARCH_PATH,
    form,
    label: `${criteria.search_kind} search`,
  };
}
