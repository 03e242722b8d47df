import axios, { type AxiosInstance } from "axios";
import { format, isValid, parse, parseISO } from "date-fns";
import { flattenColumn, type Table, toTable } from "./table-flattener";

export const DEFAULT_BASE_URL = "https://api.nilu.no/";

export type QueryValue = string | number | boolean | null | undefined;
export type QueryParameters = Record<string, QueryValue>;

// Anything the observations endpoint can read a calendar date from: ISO 8601
// or a few common spellings as strings, Date objects, epoch milliseconds
export type DateLike = string | number | Date;

export interface NiluClientOptions {
  baseUrl?: string;
  http?: AxiosInstance;
  // Set to false to silence per-request logging
  log?: boolean;
}

export interface StationFilter {
  // Only stations within the given area
  area?: string;
  // Only stations with new data
  utd?: boolean;
}

export interface AirQualityIndexFilter {
  component?: string;
  // "en" returns descriptions in English
  culture?: string;
}

export interface TimeseriesFilter {
  station?: string;
  component?: string;
  timestep?: number;
}

export interface ObservationFilter {
  // Defaults to "all"
  station?: string;
  components?: string | Iterable<string>;
  // Invalid values are returned as null when true
  showinvalid?: boolean;
}

/**
 * Builds a query string from named parameters, keeping their order.
 * Unset parameters are left out; values are not percent-encoded here.
 */
export function stringifyQuery(parameters: QueryParameters): string {
  return Object.entries(parameters)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([name, value]) => `${name}=${String(value)}`)
    .join("&");
}

export class InvalidDateError extends RangeError {
  constructor(readonly value: DateLike) {
    super(`Invalid date: ${String(value)}`);
    this.name = "InvalidDateError";
  }
}

// Calendar date at the start of an ISO 8601 string, e.g. 2021-05-01T01:00+02:00
const ISO_DATE_PREFIX = /^(\d{4})-?(\d{2})-?(\d{2})(?:[T ]|$)/;

// Non-ISO spellings; numeric day/month orders other than year-first are ambiguous and left out
const DATE_PATTERNS = [
  "yyyy/MM/dd",
  "yyyy.MM.dd",
  "MMM d, yyyy",
  "MMMM d, yyyy",
  "d MMM yyyy",
  "d MMMM yyyy",
];

function parseDateString(value: string): string | undefined {
  const text = value.trim();

  if (isValid(parseISO(text))) {
    // The timestamp's own date, whatever its offset or the local timezone
    const prefix = ISO_DATE_PREFIX.exec(text);
    return prefix
      ? `${prefix[1]}-${prefix[2]}-${prefix[3]}`
      : format(parseISO(text), "yyyy-MM-dd");
  }

  const reference = new Date(2000, 0, 1);
  for (const pattern of DATE_PATTERNS) {
    const date = parse(text, pattern, reference);
    if (isValid(date)) {
      return format(date, "yyyy-MM-dd");
    }
  }
  return undefined;
}

/**
 * Normalizes a date-like value to `YYYY-MM-DD`.
 *
 * ISO 8601 strings keep the calendar date they are written with, so a
 * timestamp with a time of day or an offset keeps only its date. A few
 * other spellings (`2021/05/01`, `May 1, 2021`, `1 May 2021`) are read
 * too. `Date` objects and epoch milliseconds use the local calendar.
 */
export function toCalendarDate(value: DateLike): string {
  if (typeof value === "string") {
    const date = parseDateString(value);
    if (date === undefined) {
      throw new InvalidDateError(value);
    }
    return date;
  }

  const date = new Date(value);
  if (!isValid(date)) {
    throw new InvalidDateError(value);
  }
  return format(date, "yyyy-MM-dd");
}

export function joinComponents(components: string | Iterable<string>): string {
  return typeof components === "string"
    ? components
    : Array.from(components).join(";");
}

/**
 * API client for the NILU air quality service.
 *
 * See https://api.nilu.no/ for more information.
 */
export class NiluClient {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly log: boolean;

  constructor(options: NiluClientOptions = {}) {
    const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.http =
      options.http ??
      axios.create({ headers: { Accept: "application/json" } });
    this.log = options.log ?? true;
  }

  buildUrl(path: string, parameters: QueryParameters = {}): string {
    const query = stringifyQuery(parameters);
    return query
      ? `${this.baseUrl}${path}?${query}`
      : `${this.baseUrl}${path}`;
  }

  // Non-2xx responses reject with the AxiosError as is
  private async getTable(
    path: string,
    parameters: QueryParameters = {}
  ): Promise<Table> {
    const url = this.buildUrl(path, parameters);
    if (this.log) {
      console.log(`NILU request: GET ${url}`);
    }

    const response = await this.http.get<unknown>(url);
    return toTable(response.data);
  }

  /**
   * Returns all available areas.
   */
  getAreas(): Promise<Table> {
    return this.getTable("lookup/areas");
  }

  /**
   * Returns metadata for all stations.
   */
  getStations({ area, utd }: StationFilter = {}): Promise<Table> {
    return this.getTable("lookup/stations", { area, utd });
  }

  /**
   * Returns all available components.
   */
  getComponents(): Promise<Table> {
    return this.getTable("lookup/components");
  }

  /**
   * Returns the air quality index per component, one row per index band.
   */
  async getAirQualityIndex({
    component,
    culture,
  }: AirQualityIndexFilter = {}): Promise<Table> {
    const table = await this.getTable("lookup/aqis", { component, culture });
    return flattenColumn(table, "aqis");
  }

  /**
   * Returns all available time series.
   */
  getTimeseries({
    station,
    component,
    timestep,
  }: TimeseriesFilter = {}): Promise<Table> {
    return this.getTable("lookup/timeseries", {
      station,
      component,
      timestep,
    });
  }

  /**
   * Returns all observations within the given time period, one row per
   * observed value.
   */
  async getObservations(
    fromtime: DateLike,
    totime: DateLike,
    { station = "all", components, showinvalid }: ObservationFilter = {}
  ): Promise<Table> {
    const from = toCalendarDate(fromtime);
    const to = toCalendarDate(totime);

    const table = await this.getTable(
      `obs/historical/${from}/${to}/${station}`,
      {
        components:
          components === undefined ? undefined : joinComponents(components),
        showinvalid,
      }
    );
    return flattenColumn(table, "values");
  }
}
