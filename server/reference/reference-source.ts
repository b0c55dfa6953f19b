import type { Commission, State } from "@shared/schema";
import { NotFoundError, UpstreamError } from "../errors";
import type { UpstreamPayload } from "../upstream/classifier";
import { extractOptions, normalizeText } from "../upstream/html";
import { commissionsRequest, statesRequest } from "../upstream/requests";
import type { UpstreamTransport } from "../upstream/transport";

/** Where the cache loads reference data from on a miss. */
export interface ReferenceDataSource {
  fetchStates(): Promise<State[]>;
  fetchCommissions(stateId: string): Promise<Commission[]>;
}

const STATE_SELECTORS = ["select#states option", 'select[name="state_id"] option', 'select[name="state"] option'];
const COMMISSION_SELECTORS = [
  "select#commissions option",
  'select[name="commission_id"] option',
  'select[name="commission"] option',
];

const STATE_ID_KEYS = ["state_id", "stateId", "id"];
const STATE_TEXT_KEYS = ["state_text", "stateName", "state_name", "name"];
const COMMISSION_ID_KEYS = ["commission_id", "commissionId", "id"];
const COMMISSION_TEXT_KEYS = ["commission_text", "commissionName", "commissionNameEn", "commission_name", "name"];
const LIST_KEYS = ["data", "states", "commissions", "results"];

interface Pair {
  id: string;
  text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickText(record: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) return normalizeText(value);
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return "";
}

function listFrom(data: unknown): unknown[] | null {
  if (Array.isArray(data)) return data;
  if (!isRecord(data)) return null;
  for (const key of LIST_KEYS) {
    const candidate = data[key];
    if (Array.isArray(candidate)) return candidate;
  }
  return null;
}

/**
 * Turns a dropdown page or a JSON list into id/text pairs, keeping the first
 * occurrence of each id.
 */
export function parseReferencePairs(
  payload: UpstreamPayload,
  selectors: readonly string[],
  idKeys: readonly string[],
  textKeys: readonly string[],
): Pair[] {
  let pairs: Pair[];
  if (payload.format === "html") {
    pairs = extractOptions(payload.html, selectors).map((option) => ({ id: option.value, text: option.text }));
  } else {
    const list = listFrom(payload.data);
    if (list === null) {
      throw new UpstreamError(200, "reference list payload has no list");
    }
    pairs = list
      .filter(isRecord)
      .map((record) => ({ id: pickText(record, idKeys), text: pickText(record, textKeys) }))
      .filter((pair) => pair.id !== "" && pair.text !== "");
  }

  const seen = new Set<string>();
  return pairs.filter((pair) => {
    if (seen.has(pair.id)) return false;
    seen.add(pair.id);
    return true;
  });
}

export class UpstreamReferenceSource implements ReferenceDataSource {
  constructor(private readonly transport: UpstreamTransport) {}

  async fetchStates(): Promise<State[]> {
    const outcome = await this.transport.send(statesRequest());
    if (!outcome.ok) throw outcome.error;

    const states = parseReferencePairs(outcome.payload, STATE_SELECTORS, STATE_ID_KEYS, STATE_TEXT_KEYS).map(
      (pair) => ({ state_text: pair.text, state_id: pair.id }),
    );
    // Every state is always listed, so an empty dropdown is a broken or substitute page.
    if (states.length === 0) {
      throw new UpstreamError(outcome.status, "state list missing from portal page");
    }
    return states;
  }

  async fetchCommissions(stateId: string): Promise<Commission[]> {
    const outcome = await this.transport.send(commissionsRequest(stateId));
    if (!outcome.ok) throw outcome.error;

    const commissions = parseReferencePairs(
      outcome.payload,
      COMMISSION_SELECTORS,
      COMMISSION_ID_KEYS,
      COMMISSION_TEXT_KEYS,
    ).map((pair) => ({ commission_text: pair.text, commission_id: pair.id, state_id: stateId }));
    if (commissions.length === 0) {
      throw new NotFoundError("commissions", `No commissions found for state ID: ${stateId}`);
    }
    return commissions;
  }
}
