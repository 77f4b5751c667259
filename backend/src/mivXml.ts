import axios, { type AxiosInstance } from "axios";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { createHash } from "crypto";
import type { UpdaterConfig } from "./config.js";
import { DataFormatError, FeedFetchError } from "./errors.js";

const SENSOR_TAG = "meetpunt";
const SENSOR_ID_ATTR = "@_unieke_id";
const CLASS_GROUP_TAG = "meetdata";
const CLASS_ID_ATTR = "@_klasse_id";

/**
 * Raw text fields of one sensor element, exactly as published (Dutch field names,
 * comma decimals, numeric codes as strings). Typed only once cleaned.
 */
export type RawFields = Record<string, string>;
/** Top-level sensor fields plus the fields of the selected measurement class. */
export type RawMeasurement = RawFields;
/** Station configuration: volledige_naam, Rijstrook, lengtegraad/breedtegraad_EPSG_4326, ... */
export type RawMetadata = RawFields;

export interface FeedDocument {
  body: string;
  /** MD5 of the body, logged so unchanged upstream data is easy to spot between runs. */
  xmlHash: string;
}

/**
 * Attributes get a prefix: the configuration feed has a `beschrijvende_id` attribute
 * and child element on the same sensor. Values stay text; cleaning decides the types.
 */
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name, _jpath, _isLeafNode, isAttribute) =>
    !isAttribute && (name === SENSOR_TAG || name === CLASS_GROUP_TAG),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function reasonOf(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) return `HTTP ${err.response.status}${err.response.statusText ? ` ${err.response.statusText}` : ""}`;
    return err.code ? `${err.code} (${err.message})` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Single GET, no retry. Any transport failure becomes a FeedFetchError. */
export async function fetchFeed(
  feed: string,
  url: string,
  timeoutMs: number,
  client: AxiosInstance = axios
): Promise<FeedDocument> {
  console.log(`Fetching ${feed} feed from ${url}`);
  let data: unknown;
  try {
    const response = await client.get<unknown>(url, {
      timeout: timeoutMs,
      responseType: "text",
      headers: { Accept: "application/xml, text/xml" },
    });
    data = response.data;
  } catch (err) {
    throw new FeedFetchError(feed, url, reasonOf(err), { cause: err });
  }
  if (typeof data !== "string") {
    throw new DataFormatError(`${feed} feed did not return a text body`);
  }
  const xmlHash = createHash("md5").update(data).digest("hex");
  return { body: data, xmlHash };
}

function parseDocument(xml: string): unknown {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new DataFormatError(`Malformed XML at line ${line}, column ${col}: ${msg}`);
  }
  return parser.parse(xml);
}

/** Every sensor element anywhere in the document, in document order. */
function collectSensors(node: unknown, out: Record<string, unknown>[] = []): Record<string, unknown>[] {
  if (Array.isArray(node)) {
    for (const item of node) collectSensors(item, out);
    return out;
  }
  if (!isRecord(node)) return out;
  for (const [name, value] of Object.entries(node)) {
    if (name === SENSOR_TAG && Array.isArray(value)) {
      for (const sensor of value) {
        if (isRecord(sensor)) out.push(sensor);
      }
    } else {
      collectSensors(value, out);
    }
  }
  return out;
}

/** Integer-like text: optional sign and digits, surrounding whitespace ignored. */
export function parseIntegerText(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}

function sensorIdOf(sensor: Record<string, unknown>): number {
  const raw = sensor[SENSOR_ID_ATTR];
  const id = typeof raw === "string" ? parseIntegerText(raw) : null;
  if (id === null) {
    throw new DataFormatError(`Sensor element has no integer unieke_id (got ${JSON.stringify(raw ?? null)})`, {
      field: "unieke_id",
    });
  }
  return id;
}

/**
 * Text of a child element. Repeated elements keep the last value; elements that only
 * carry attributes or nested elements have no text of their own.
 */
function leafText(value: unknown): string {
  if (Array.isArray(value)) return value.length ? leafText(value[value.length - 1]) : "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isRecord(value)) {
    const text = value["#text"];
    return typeof text === "string" || typeof text === "number" ? String(text) : "";
  }
  return "";
}

function copyChildren(element: Record<string, unknown>, into: RawFields): void {
  for (const [name, value] of Object.entries(element)) {
    if (name.startsWith("@_") || name === "#text") continue;
    into[name] = leafText(value);
  }
}

/**
 * Live data: top-level sensor fields, plus the fields of the one measurement-class group
 * whose klasse_id matches. Other class groups are ignored.
 */
export function extractMeasurements(xml: string, classId: string): Map<number, RawMeasurement> {
  const measurements = new Map<number, RawMeasurement>();
  for (const sensor of collectSensors(parseDocument(xml))) {
    const fields: RawMeasurement = {};
    for (const [name, value] of Object.entries(sensor)) {
      if (name.startsWith("@_") || name === "#text") continue;
      if (name !== CLASS_GROUP_TAG) {
        fields[name] = leafText(value);
        continue;
      }
      const groups = Array.isArray(value) ? value : [value];
      for (const group of groups) {
        if (isRecord(group) && group[CLASS_ID_ATTR] === classId) copyChildren(group, fields);
      }
    }
    measurements.set(sensorIdOf(sensor), fields);
  }
  return measurements;
}

/** Station configuration: all child elements, unfiltered. */
export function extractMetadata(xml: string): Map<number, RawMetadata> {
  const metadata = new Map<number, RawMetadata>();
  for (const sensor of collectSensors(parseDocument(xml))) {
    const fields: RawMetadata = {};
    copyChildren(sensor, fields);
    metadata.set(sensorIdOf(sensor), fields);
  }
  return metadata;
}

export async function fetchMeasurements(
  config: UpdaterConfig,
  client?: AxiosInstance
): Promise<Map<number, RawMeasurement>> {
  const doc = await fetchFeed("measurement", config.measurementFeedUrl, config.requestTimeoutMs, client);
  const measurements = extractMeasurements(doc.body, config.measurementClassId);
  console.log(`Fetched measurement feed: ${measurements.size} sensor(s), md5 ${doc.xmlHash}.`);
  return measurements;
}

export async function fetchMetadata(
  config: UpdaterConfig,
  client?: AxiosInstance
): Promise<Map<number, RawMetadata>> {
  const doc = await fetchFeed("metadata", config.metadataFeedUrl, config.requestTimeoutMs, client);
  const metadata = extractMetadata(doc.body);
  console.log(`Fetched metadata feed: ${metadata.size} sensor(s), md5 ${doc.xmlHash}.`);
  return metadata;
}
