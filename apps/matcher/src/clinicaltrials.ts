/**
 * ClinicalTrials.gov Data API v2: condition search and lookup by NCT id, normalized
 * into Trial records and cached for 24 hours.
 */

import { searchCacheKey, trialCacheKey, type CacheStore, type Trial } from "@trialmatch/database";
import { RegistryUnavailableError, ValidationError, errorMessage } from "@trialmatch/match-ai";
import { z } from "zod";
import { fetchWithRetry, type RetryConfig } from "./fetchWithRetry.js";

export const CT_BASE = "https://clinicaltrials.gov/api/v2";
export const MAX_SEARCH_RESULTS = 100;
const MAX_PAGE_SIZE = 100;
const MAX_LOCATIONS = 5;
const NCT_ID = /^NCT\d{8}$/;

/** Only actively recruiting trials are offered for matching. */
export const SEARCH_FILTERS: Readonly<Record<string, string>> = {
  "filter.overallStatus": "RECRUITING",
};

const StudySchema = z.object({
  protocolSection: z
    .object({
      identificationModule: z
        .object({ nctId: z.string(), briefTitle: z.string(), officialTitle: z.string() })
        .partial()
        .optional(),
      statusModule: z.object({ overallStatus: z.string() }).partial().optional(),
      descriptionModule: z.object({ briefSummary: z.string() }).partial().optional(),
      conditionsModule: z.object({ conditions: z.array(z.string()) }).partial().optional(),
      designModule: z
        .object({
          phases: z.array(z.string()),
          enrollmentInfo: z.object({ count: z.number().int() }).partial(),
        })
        .partial()
        .optional(),
      armsInterventionsModule: z
        .object({ interventions: z.array(z.object({ name: z.string() }).partial()) })
        .partial()
        .optional(),
      eligibilityModule: z
        .object({
          eligibilityCriteria: z.string(),
          sex: z.string(),
          minimumAge: z.string(),
          maximumAge: z.string(),
        })
        .partial()
        .optional(),
      contactsLocationsModule: z
        .object({
          locations: z.array(z.object({ city: z.string(), state: z.string(), country: z.string() }).partial()),
        })
        .partial()
        .optional(),
    })
    .optional(),
});

/** Studies are checked one by one so a single odd record cannot sink the page. */
const StudiesPageSchema = z.object({
  studies: z.array(z.unknown()),
  nextPageToken: z.string().optional(),
});

type Study = z.infer<typeof StudySchema>;

export interface SearchOptions {
  /** Cancels the registry requests. */
  signal?: AbortSignal;
}

/** What the matcher needs from a registry. */
export interface TrialSource {
  search(condition: string, maxResults: number, options?: SearchOptions): Promise<Trial[]>;
  getById(nctId: string): Promise<Trial | null>;
}

function nonEmpty(text: string | null | undefined): string | null {
  const trimmed = text?.trim();
  return trimmed ? trimmed : null;
}

const INCLUSION_HEADING = /^[ \t]*(?:key[ \t]+)?inclusion criteria[ \t]*:?/im;
const EXCLUSION_HEADING = /^[ \t]*(?:key[ \t]+)?exclusion criteria[ \t]*:?/im;

/**
 * Splits the registry's single eligibility text on its "Inclusion Criteria:" and
 * "Exclusion Criteria:" headings. Text without headings is all inclusion.
 */
export function splitEligibilityCriteria(text: string | null | undefined): {
  inclusion: string | null;
  exclusion: string | null;
} {
  const body = nonEmpty(text);
  if (!body) return { inclusion: null, exclusion: null };
  const exclusion = EXCLUSION_HEADING.exec(body);
  const head = exclusion ? body.slice(0, exclusion.index) : body;
  const tail = exclusion ? body.slice(exclusion.index + exclusion[0].length) : "";
  const inclusion = INCLUSION_HEADING.exec(head);
  const inclusionText = inclusion ? head.slice(inclusion.index + inclusion[0].length) : head;
  return { inclusion: nonEmpty(inclusionText), exclusion: nonEmpty(tail) };
}

/** Map one registry study to a Trial; null when it has no NCT id. */
export function normalizeStudy(study: Study): Trial | null {
  const p = study.protocolSection;
  const nctId = nonEmpty(p?.identificationModule?.nctId);
  if (!nctId) return null;

  const phases = p?.designModule?.phases ?? [];
  const eligibility = p?.eligibilityModule;
  const { inclusion, exclusion } = splitEligibilityCriteria(eligibility?.eligibilityCriteria);

  const locations: string[] = [];
  for (const loc of p?.contactsLocationsModule?.locations ?? []) {
    const city = nonEmpty(loc.city);
    const region = nonEmpty(loc.state) ?? nonEmpty(loc.country);
    if (!city) continue;
    const label = region ? `${city}, ${region}` : city;
    if (!locations.includes(label)) locations.push(label);
    if (locations.length >= MAX_LOCATIONS) break;
  }

  const interventions = (p?.armsInterventionsModule?.interventions ?? [])
    .map((i) => nonEmpty(i.name))
    .filter((name): name is string => name !== null);

  return {
    nct_id: nctId,
    title: nonEmpty(p?.identificationModule?.briefTitle) ?? nonEmpty(p?.identificationModule?.officialTitle),
    phase: phases.length ? phases.join(", ") : null,
    status: nonEmpty(p?.statusModule?.overallStatus),
    brief_summary: nonEmpty(p?.descriptionModule?.briefSummary),
    inclusion_criteria: inclusion,
    exclusion_criteria: exclusion,
    conditions: p?.conditionsModule?.conditions ?? [],
    locations,
    interventions,
    minimum_age: nonEmpty(eligibility?.minimumAge),
    maximum_age: nonEmpty(eligibility?.maximumAge),
    sex: nonEmpty(eligibility?.sex),
    enrollment: p?.designModule?.enrollmentInfo?.count ?? null,
    source_url: `https://clinicaltrials.gov/study/${nctId}`,
  };
}

export interface TrialRegistryOptions {
  cache: CacheStore;
  baseUrl?: string;
  /** Studies requested per page; the API caps it at 100. */
  pageSize?: number;
  retry?: RetryConfig;
}

export class TrialRegistryClient implements TrialSource {
  private readonly cache: CacheStore;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly retry: RetryConfig;

  constructor(options: TrialRegistryOptions) {
    this.cache = options.cache;
    this.baseUrl = (options.baseUrl ?? CT_BASE).replace(/\/+$/, "");
    this.pageSize = Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
    this.retry = options.retry ?? { maxRetries: 2, initialMs: 800, timeoutMs: 30_000 };
  }

  /**
   * Recruiting trials for a condition, in registry order. Served from cache while the
   * entry is fresh; otherwise fetched page by page and cached.
   */
  async search(condition: string, maxResults = 20, options: SearchOptions = {}): Promise<Trial[]> {
    const term = condition.trim();
    const issues: string[] = [];
    if (!term) issues.push("condition: must not be blank");
    if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > MAX_SEARCH_RESULTS) {
      issues.push(`maxResults: must be an integer between 1 and ${MAX_SEARCH_RESULTS}`);
    }
    if (issues.length > 0) throw new ValidationError(issues);

    const key = searchCacheKey({ condition: term, maxResults, filters: { ...SEARCH_FILTERS } });
    const cached = await this.readCache(key);
    if (cached) {
      console.log(`[registry] Cache hit for "${term}" (${cached.length} trials)`);
      return cached;
    }

    const trials = await this.fetchSearch(term, maxResults, options.signal);
    await this.writeCache(key, trials);
    console.log(`[registry] Found ${trials.length} trials for "${term}"`);
    return trials;
  }

  /** One trial by NCT id; null when the registry has no such study. */
  async getById(nctId: string): Promise<Trial | null> {
    const id = nctId.trim().toUpperCase();
    if (!NCT_ID.test(id)) throw new ValidationError([`nctId: "${nctId}" is not an NCT identifier`]);

    const key = trialCacheKey(id);
    const cached = await this.readCache(key);
    if (cached?.[0]) return cached[0];

    const url = `${this.baseUrl}/studies/${encodeURIComponent(id)}?format=json`;
    const res = await this.request(url);
    if (res.status === 404) {
      await res.body?.cancel();
      console.warn(`[registry] Trial not found: ${id}`);
      return null;
    }
    const body = await this.readJson(res, url);
    const study = StudySchema.safeParse(body);
    if (!study.success) throw new RegistryUnavailableError(`Malformed study payload from ${url}`);
    const trial = normalizeStudy(study.data);
    if (!trial) throw new RegistryUnavailableError(`Study payload from ${url} has no NCT id`);

    await this.writeCache(key, [trial]);
    return trial;
  }

  private async fetchSearch(term: string, maxResults: number, signal?: AbortSignal): Promise<Trial[]> {
    const trials: Trial[] = [];
    let pageToken: string | undefined;
    do {
      const params = new URLSearchParams({
        format: "json",
        "query.cond": term,
        pageSize: String(Math.min(maxResults - trials.length, this.pageSize)),
        ...SEARCH_FILTERS,
      });
      if (pageToken) params.set("pageToken", pageToken);
      const url = `${this.baseUrl}/studies?${params.toString()}`;

      const res = await this.request(url, signal);
      const page = StudiesPageSchema.safeParse(await this.readJson(res, url));
      if (!page.success) throw new RegistryUnavailableError(`Malformed search payload from ${url}`);

      const before = trials.length;
      for (const entry of page.data.studies) {
        const study = StudySchema.safeParse(entry);
        if (!study.success) {
          const detail = study.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
          console.warn(`[registry] Skipping malformed study (${detail})`);
          continue;
        }
        const trial = normalizeStudy(study.data);
        if (!trial) {
          console.warn("[registry] Skipping study without an NCT id");
          continue;
        }
        trials.push(trial);
        if (trials.length >= maxResults) break;
      }
      if (trials.length === before && page.data.nextPageToken) {
        console.warn(`[registry] Page added no trials for "${term}", stopping`);
        break;
      }
      pageToken = page.data.nextPageToken;
    } while (pageToken && trials.length < maxResults);
    return trials;
  }

  /** Returns 2xx and 404 responses; anything else is RegistryUnavailableError. */
  private async request(url: string, signal?: AbortSignal): Promise<Response> {
    let res: Response;
    try {
      res = await fetchWithRetry(url, { headers: { Accept: "application/json" }, signal }, this.retry);
    } catch (err) {
      console.error(`[registry] Request failed for ${url}:`, errorMessage(err));
      throw new RegistryUnavailableError(`Trial registry unreachable: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok && res.status !== 404) {
      await res.body?.cancel();
      console.error(`[registry] HTTP ${res.status} for ${url}`);
      throw new RegistryUnavailableError(`Trial registry returned HTTP ${res.status}`);
    }
    return res;
  }

  private async readJson(res: Response, url: string): Promise<unknown> {
    try {
      return await res.json();
    } catch (err) {
      throw new RegistryUnavailableError(`Trial registry returned invalid JSON from ${url}`, { cause: err });
    }
  }

  private async readCache(key: string): Promise<Trial[] | null> {
    try {
      const entry = await this.cache.get(key);
      return entry ? entry.payload : null;
    } catch (err) {
      console.warn(`[cache] Read failed for ${key}, fetching instead:`, errorMessage(err));
      return null;
    }
  }

  private async writeCache(key: string, trials: Trial[]): Promise<void> {
    try {
      await this.cache.put(key, trials);
    } catch (err) {
      console.warn(`[cache] Write failed for ${key}:`, errorMessage(err));
    }
  }
}
