import type { CaseRecord, SearchKind } from "@shared/schema";

export const CASE_RECORD_FIELDS = [
  "case_number",
  "case_stage",
  "filing_date",
  "complainant",
  "complainant_advocate",
  "respondent",
  "respondent_advocate",
  "document_link",
] as const satisfies readonly (keyof CaseRecord)[];

export type CaseRecordField = (typeof CASE_RECORD_FIELDS)[number];

export interface FieldMapping {
  /** Upstream key or column header candidates, in priority order, as produced by {@link mappingKey}. */
  keys: readonly string[];
  /** Cell index used when the result table has no header row. */
  column: number | null;
}

export type KindMapping = Record<CaseRecordField, FieldMapping>;

/** "Case No.", "case_no" and "caseNo" all become "caseno". */
export function mappingKey(raw: string): string {
  return raw.toLowerCase().replace(/[^a-z0-9]/g, "");
}

const BASE_MAPPING: KindMapping = {
  case_number: { keys: ["casenumber", "caseno", "casenum", "fillingreferencenumber"], column: 0 },
  case_stage: { keys: ["casestage", "casestagename", "stage", "status", "casestatus"], column: 1 },
  filing_date: { keys: ["filingdate", "casefilingdate", "dateoffiling", "fileddate"], column: 2 },
  complainant: { keys: ["complainant", "complainantname", "petitioner"], column: 3 },
  complainant_advocate: {
    keys: ["complainantadvocate", "complainantadvocatename", "complainantadvocatenames"],
    column: 4,
  },
  respondent: { keys: ["respondent", "respondentname", "oppositeparty"], column: 5 },
  respondent_advocate: {
    keys: ["respondentadvocate", "respondentadvocatename", "respondentadvocatenames"],
    column: 6,
  },
  document_link: { keys: ["documentlink", "documenturl", "orderdocumentpath", "pdfurl", "link"], column: 7 },
};

interface FieldOverride {
  /** Tried before the base keys. */
  keys?: readonly string[];
  column?: number | null;
}

function withOverrides(
  overrides: Partial<Record<CaseRecordField, FieldOverride>>,
  columnShift = 0,
): KindMapping {
  const mapping: KindMapping = { ...BASE_MAPPING };
  for (const field of CASE_RECORD_FIELDS) {
    const base = BASE_MAPPING[field];
    const override = overrides[field] ?? {};
    const column = override.column !== undefined ? override.column : base.column;
    mapping[field] = {
      keys: [...(override.keys ?? []), ...base.keys],
      column: column === null ? null : column + columnShift,
    };
  }
  return mapping;
}

/**
 * Per-kind view of the result rows. Header-less tables of the judge and
 * industry-type searches open with the presiding member or industry column;
 * advocate searches name the matched advocate `advocateName`.
 */
export const FIELD_MAPPINGS: Readonly<Record<SearchKind, KindMapping>> = {
  case_number: withOverrides({}),
  complainant: withOverrides({}),
  respondent: withOverrides({}),
  complainant_advocate: withOverrides({ complainant_advocate: { keys: ["advocatename"] } }),
  respondent_advocate: withOverrides({ respondent_advocate: { keys: ["advocatename"] } }),
  industry_type: withOverrides({ case_stage: { keys: ["stageofcase"] } }, 1),
  judge: withOverrides({ case_stage: { keys: ["proceedingstage"] } }, 1),
};
