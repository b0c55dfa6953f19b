import type { CaseRecord, PagedResult, SearchKind } from "@shared/schema";
import { UpstreamError } from "../errors";
import type { UpstreamPayload } from "../upstream/classifier";
import { extractResultPage } from "../upstream/html";
import { parseUpstreamDate } from "./dates";
import { FIELD_MAPPINGS, mappingKey, type CaseRecordField, type FieldMapping } from "./field-mappings";

/** A result payload tagged with the search kind that produced it. */
export type SearchPayload = UpstreamPayload & { kind: SearchKind };

export interface NormalizationWarning {
  /** Zero-based position of the row in the upstream payload. */
  row: number;
  field: CaseRecordField | null;
  value: string;
  reason: string;
}

export interface NormalizeOptions {
  page: number;
  perPage: number;
  /** Root-relative document links are resolved against this. */
  documentBaseUrl: string;
}

export interface NormalizedPage {
  result: PagedResult;
  /** False when the upstream did not report a total and the pagination is a lower bound. */
  totalIsExact: boolean;
  warnings: NormalizationWarning[];
}

/** One upstream row, regardless of where it came from. */
interface RawRow {
  position: number;
  named: Map<string, unknown>;
  cells: string[] | null;
}

const ROW_LIST_KEYS = ["cases", "data", "results", "content", "records"];
const TOTAL_KEYS = ["total_count", "totalCount", "totalRecords", "totalElements", "total"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCount(value: unknown): number | null {
  const count = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof count === "number" && Number.isInteger(count) && count >= 0 ? count : null;
}

function namedFromRecord(record: Record<string, unknown>): Map<string, unknown> {
  const named = new Map<string, unknown>();
  for (const [key, value] of Object.entries(record)) {
    const normalized = mappingKey(key);
    if (!named.has(normalized)) named.set(normalized, value);
  }
  return named;
}

function rowsFromJson(data: unknown, warnings: NormalizationWarning[]): { rows: RawRow[]; total: number | null } {
  let list: unknown[] | null = null;
  let total: number | null = null;

  if (Array.isArray(data)) {
    list = data;
  } else if (isRecord(data)) {
    for (const key of ROW_LIST_KEYS) {
      const candidate = data[key];
      if (Array.isArray(candidate)) {
        list = candidate;
        break;
      }
    }
    for (const key of TOTAL_KEYS) {
      total = toCount(data[key]);
      if (total !== null) break;
    }
  }

  if (list === null) {
    throw new UpstreamError(200, "result payload carries no row list");
  }

  const rows: RawRow[] = [];
  list.forEach((item, index) => {
    if (!isRecord(item)) {
      warnings.push({ row: index, field: null, value: JSON.stringify(item) ?? "", reason: "row is not an object" });
      return;
    }
    rows.push({ position: index, named: namedFromRecord(item), cells: null });
  });
  return { rows, total };
}

function rowsFromHtml(html: string): { rows: RawRow[]; total: number | null } {
  const page = extractResultPage(html);
  const rows = page.rows.map((row, position) => {
    const named = new Map<string, unknown>();
    row.headers?.forEach((header, index) => {
      const key = mappingKey(header);
      if (key && !named.has(key) && index < row.cells.length) named.set(key, row.cells[index]);
    });
    if (row.link) named.set("documentlink", row.link);
    return { position, named, cells: row.headers ? null : row.cells };
  });
  return { rows, total: page.total };
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null && !(typeof value === "string" && value.trim() === "");
}

function pick(row: RawRow, mapping: FieldMapping): unknown {
  for (const key of mapping.keys) {
    const value = row.named.get(key);
    if (present(value)) return value;
  }
  if (row.cells && mapping.column !== null) {
    return row.cells[mapping.column];
  }
  return undefined;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value.replace(/\s+/g, " ").trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function toDocumentLink(value: unknown, baseUrl: string): string | null {
  const raw = toText(value);
  if (!/^(?:https?:\/\/|\/)/i.test(raw)) return null;
  try {
    const url = new URL(raw, `${baseUrl}/`);
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : null;
  } catch {
    return null;
  }
}

function toRecord(
  row: RawRow,
  kind: SearchKind,
  documentBaseUrl: string,
  warnings: NormalizationWarning[],
): CaseRecord {
  const mapping = FIELD_MAPPINGS[kind];
  const text = (field: CaseRecordField) => toText(pick(row, mapping[field]));

  let filingDate: string | null = null;
  const parsed = parseUpstreamDate(pick(row, mapping.filing_date));
  if (parsed.status === "parsed") {
    filingDate = parsed.date;
  } else if (parsed.status === "invalid") {
    warnings.push({ row: row.position, field: "filing_date", value: parsed.raw, reason: "unrecognized date format" });
  }

  return {
    case_number: text("case_number"),
    case_stage: text("case_stage"),
    filing_date: filingDate,
    complainant: text("complainant"),
    complainant_advocate: text("complainant_advocate"),
    respondent: text("respondent"),
    respondent_advocate: text("respondent_advocate"),
    document_link: toDocumentLink(pick(row, mapping.document_link), documentBaseUrl),
  };
}

/**
 * Derives `total_count`/`total_pages`. Without an upstream total the values
 * are lower bounds: a full page implies at least one more.
 */
export function reconcilePagination(
  reportedTotal: number | null,
  rowCount: number,
  page: number,
  perPage: number,
): { total_count: number; total_pages: number; exact: boolean } {
  if (reportedTotal !== null) {
    return { total_count: reportedTotal, total_pages: Math.ceil(reportedTotal / perPage), exact: true };
  }
  // An empty page is still a non-full page, except that an empty first page means no results at all.
  if (rowCount === 0) {
    return { total_count: (page - 1) * perPage, total_pages: page === 1 ? 0 : page, exact: false };
  }
  return {
    total_count: (page - 1) * perPage + rowCount,
    total_pages: rowCount < perPage ? page : page + 1,
    exact: false,
  };
}

export function normalizeSearchPayload(payload: SearchPayload, options: NormalizeOptions): NormalizedPage {
  const warnings: NormalizationWarning[] = [];
  const { rows, total } =
    payload.format === "json" ? rowsFromJson(payload.data, warnings) : rowsFromHtml(payload.html);

  const pageRows = rows.slice(0, options.perPage);
  const cases = pageRows.map((row) => toRecord(row, payload.kind, options.documentBaseUrl, warnings));
  const pagination = reconcilePagination(total, rows.length, options.page, options.perPage);

  return {
    result: {
      cases,
      total_count: pagination.total_count,
      page: options.page,
      per_page: options.perPage,
      total_pages: pagination.total_pages,
    },
    totalIsExact: pagination.exact,
    warnings,
  };
}
