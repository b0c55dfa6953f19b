import type { Commission, State } from "@shared/schema";
import { NotFoundError } from "../errors";
import type { Logger } from "../log";
import type { ResolvedIds } from "../upstream/requests";
import type { ReferenceDataSource } from "./reference-source";

export interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
  ttlSeconds: number;
}

export interface ReferenceCacheOptions {
  statesTtlSeconds: number;
  commissionsTtlSeconds: number;
  logger: Logger;
  /** Milliseconds since the epoch; defaults to `Date.now`. */
  now?: () => number;
}

export interface ReferenceCacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredEntries: number;
  inFlight: number;
}

const STATES_KEY = "states";
const MAX_SUGGESTIONS = 5;

export function normalizeName(value: string): string {
  return value.replace(/\s+/g, " ").trim().toLowerCase();
}

function suggestionsFor(query: string, names: readonly string[]): string[] {
  const needle = normalizeName(query);
  if (!needle) return [];
  return names
    .filter((name) => {
      const candidate = normalizeName(name);
      return candidate.includes(needle) || needle.includes(candidate);
    })
    .slice(0, MAX_SUGGESTIONS);
}

/** The portal answered that this state has no commissions; anything else is a bad refresh. */
function isDefinitive(error: unknown): boolean {
  return error instanceof NotFoundError && error.entity === "commissions";
}

/**
 * Keyed TTL store with single-flight refresh: concurrent misses on one key
 * share a single load, and a failed refresh falls back to the expired value
 * when there is one.
 */
class SingleFlightStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(
    private readonly label: string,
    private readonly ttlSeconds: number,
    private readonly now: () => number,
    private readonly logger: Logger,
  ) {}

  read(key: string, load: () => Promise<T>): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && !this.isExpired(entry)) {
      return Promise.resolve(entry.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const refresh = this.refresh(key, load, entry).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, refresh);
    return refresh;
  }

  stats(): ReferenceCacheStats {
    let active = 0;
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry)) active += 1;
    }
    return {
      totalEntries: this.entries.size,
      activeEntries: active,
      expiredEntries: this.entries.size - active,
      inFlight: this.inFlight.size,
    };
  }

  clear(): void {
    this.entries.clear();
  }

  private describe(key: string): string {
    return key === this.label ? this.label : `${this.label} ${key}`;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() - entry.fetchedAt > entry.ttlSeconds * 1000;
  }

  private async refresh(key: string, load: () => Promise<T>, stale: CacheEntry<T> | undefined): Promise<T> {
    try {
      const value = await load();
      this.entries.set(key, { value, fetchedAt: this.now(), ttlSeconds: this.ttlSeconds });
      this.logger.debug(`${this.describe(key)}: refreshed`);
      return value;
    } catch (error) {
      if (!stale || isDefinitive(error)) throw error;

      const reason = error instanceof Error ? error.message : String(error);
      const ageSeconds = Math.round((this.now() - stale.fetchedAt) / 1000);
      this.logger.warn(
        `degraded: serving stale ${this.describe(key)} (${ageSeconds}s old) after refresh failed: ${reason}`,
      );
      return stale.value;
    }
  }
}

/**
 * In-memory states and per-state commissions. Owned by the process and passed
 * to whoever needs it; there is no module-level instance.
 */
export class ReferenceDataCache {
  private readonly states: SingleFlightStore<State[]>;
  private readonly commissions: SingleFlightStore<Commission[]>;

  constructor(
    private readonly source: ReferenceDataSource,
    options: ReferenceCacheOptions,
  ) {
    const now = options.now ?? Date.now;
    this.states = new SingleFlightStore("states", options.statesTtlSeconds, now, options.logger);
    this.commissions = new SingleFlightStore("commissions", options.commissionsTtlSeconds, now, options.logger);
  }

  getStates(): Promise<State[]> {
    return this.states.read(STATES_KEY, () => this.source.fetchStates());
  }

  async getCommissions(stateId: string): Promise<Commission[]> {
    const states = await this.getStates();
    if (!states.some((state) => state.state_id === stateId)) {
      throw new NotFoundError("commissions", `No commissions found for state ID: ${stateId}`);
    }
    return this.commissions.read(stateId, () => this.source.fetchCommissions(stateId));
  }

  /** Case-insensitive, whitespace-normalized exact match on the listed names. */
  async resolve(stateName: string, commissionName: string): Promise<ResolvedIds> {
    const states = await this.getStates();
    const wantedState = normalizeName(stateName);
    const state = states.find((candidate) => normalizeName(candidate.state_text) === wantedState);
    if (!state) {
      throw new NotFoundError(
        "state",
        `State '${stateName.trim()}' not found`,
        suggestionsFor(stateName, states.map((candidate) => candidate.state_text)),
      );
    }

    const commissions = await this.getCommissions(state.state_id);
    const wantedCommission = normalizeName(commissionName);
    const commission = commissions.find(
      (candidate) => normalizeName(candidate.commission_text) === wantedCommission,
    );
    if (!commission) {
      throw new NotFoundError(
        "commission",
        `Commission '${commissionName.trim()}' not found in state '${state.state_text}'`,
        suggestionsFor(commissionName, commissions.map((candidate) => candidate.commission_text)),
      );
    }

    return { stateId: state.state_id, commissionId: commission.commission_id };
  }

  stats(): { states: ReferenceCacheStats; commissions: ReferenceCacheStats } {
    return { states: this.states.stats(), commissions: this.commissions.stats() };
  }

  clear(): void {
    this.states.clear();
    this.commissions.clear();
  }
}
