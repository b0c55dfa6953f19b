import { z } from "zod";

// Core types shared by the HTTP surface and the upstream adapter.
// None of these are persisted; reference data lives only in the in-memory cache.

export const SEARCH_KINDS = [
  "case_number",
  "complainant",
  "respondent",
  "complainant_advocate",
  "respondent_advocate",
  "industry_type",
  "judge",
] as const;

export type SearchKind = (typeof SEARCH_KINDS)[number];

/**
 * State interface representing one entry of the upstream state dropdown
 */
export interface State {
  state_text: string;
  state_id: string;
}

/**
 * Commission interface; `state_id` always references a known state
 */
export interface Commission {
  commission_text: string;
  commission_id: string;
  state_id: string;
}

/**
 * Search criteria after request parsing and defaulting
 */
export interface SearchCriteria {
  search_kind: SearchKind;
  state: string;
  commission: string;
  search_value: string;
  date_from: string | null; // YYYY-MM-DD
  date_to: string | null;
  page: number;
  per_page: number;
}

/**
 * Canonical case record returned for every search kind
 */
export interface CaseRecord {
  case_number: string;
  case_stage: string;
  filing_date: string | null;
  complainant: string;
  complainant_advocate: string;
  respondent: string;
  respondent_advocate: string;
  document_link: string | null;
}

/**
 * Paginated search result interface
 */
export interface PagedResult {
  cases: CaseRecord[];
  total_count: number;
  page: number;
  per_page: number;
  total_pages: number;
}

export interface StateListResponse {
  states: State[];
}

export interface CommissionListResponse {
  commissions: Commission[];
  state_id: string;
}

export interface ErrorBody {
  detail: string;
  field?: string;
  suggestions?: string[];
}

export interface CaptchaErrorBody {
  detail: "captcha_required";
  captcha: true;
  message: string;
}

// Validation schemas

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

// Query strings send empty parameters as "", which means "not given".
const blankAsMissing = (value: unknown) => (value === "" ? undefined : value);

const isoDateSchema = z
  .string()
  .refine(isCalendarDate, { message: "must be a valid date in YYYY-MM-DD format" });

const integerSchema = z.coerce
  .number({ invalid_type_error: "must be an integer" })
  .int({ message: "must be an integer" });

export const searchRequestSchema = z.object({
  state: z.string({ required_error: "is required", invalid_type_error: "must be a string" }),
  commission: z.string({ required_error: "is required", invalid_type_error: "must be a string" }),
  search_value: z.string({ required_error: "is required", invalid_type_error: "must be a string" }),
  date_from: z.preprocess(blankAsMissing, isoDateSchema.nullish()),
  date_to: z.preprocess(blankAsMissing, isoDateSchema.nullish()),
  page: z.preprocess(blankAsMissing, integerSchema.default(1)),
  per_page: z.preprocess(blankAsMissing, integerSchema.optional()),
});

export type SearchRequest = z.infer<typeof searchRequestSchema>;
