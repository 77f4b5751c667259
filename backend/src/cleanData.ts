import { DataFormatError } from "./errors.js";
import { parseIntegerText, type RawMeasurement, type RawMetadata } from "./mivXml.js";

export interface CleanedRecord {
  /** voertuigsnelheid_rekenkundig: arithmetic mean vehicle speed (km/h) */
  speed: number;
  working: boolean;
}

export interface JoinedRecord extends CleanedRecord {
  longitude: number;
  latitude: number;
  location: string;
  lane: string;
}

/** Highest beschikbaar / geldig code that still counts as usable data. */
const MAX_USABLE_CODE = 1;

function requireInteger(raw: RawMeasurement, sensorId: number, field: string): number {
  const text = raw[field];
  if (text === undefined) {
    throw new DataFormatError(`Sensor ${sensorId} has no ${field} field`, { sensorId, field });
  }
  const value = parseIntegerText(text);
  if (value === null) {
    throw new DataFormatError(`Sensor ${sensorId} has non-numeric ${field}: "${text}"`, { sensorId, field });
  }
  return value;
}

/** defect is a text flag: absent or empty means not defective. */
function isDefective(raw: RawMeasurement): boolean {
  return Boolean(raw.defect);
}

export function cleanMeasurement(sensorId: number, raw: RawMeasurement): CleanedRecord {
  const available = requireInteger(raw, sensorId, "beschikbaar");
  const valid = requireInteger(raw, sensorId, "geldig");
  const speed = requireInteger(raw, sensorId, "voertuigsnelheid_rekenkundig");
  return {
    speed,
    working: !isDefective(raw) && available <= MAX_USABLE_CODE && valid <= MAX_USABLE_CODE,
  };
}

/** One cleaned record per measured sensor; a malformed field aborts the run. */
export function cleanMeasurements(raw: Map<number, RawMeasurement>): Map<number, CleanedRecord> {
  const cleaned = new Map<number, CleanedRecord>();
  for (const [sensorId, fields] of raw) {
    cleaned.set(sensorId, cleanMeasurement(sensorId, fields));
  }
  return cleaned;
}

/** "51,21" → 51.21; null when the text is not a finite number. */
export function parseCommaDecimal(text: string): number | null {
  const normalized = text.trim().replace(/,/g, ".");
  if (normalized === "") return null;
  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

type Placement = Omit<JoinedRecord, keyof CleanedRecord>;

function requireCoordinate(sensorId: number, field: string, text: string): number {
  const value = parseCommaDecimal(text);
  if (value === null) {
    throw new DataFormatError(`Sensor ${sensorId} has non-numeric ${field}: "${text}"`, { sensorId, field });
  }
  return value;
}

/** "no-station" and "missing-field" drop the sensor; a malformed coordinate aborts the run. */
function locate(sensorId: number, meta: RawMetadata | undefined): Placement | "no-station" | "missing-field" {
  if (!meta) return "no-station";
  const { lengtegraad_EPSG_4326: lon, breedtegraad_EPSG_4326: lat, volledige_naam: location, Rijstrook: lane } = meta;
  if (lon === undefined || lat === undefined || location === undefined || lane === undefined) return "missing-field";
  return {
    longitude: requireCoordinate(sensorId, "lengtegraad_EPSG_4326", lon),
    latitude: requireCoordinate(sensorId, "breedtegraad_EPSG_4326", lat),
    location,
    lane,
  };
}

/**
 * Attach station name, lane and coordinates. Sensors without a station, or whose station lacks
 * one of the four fields, are left out; the input map is not modified.
 */
export function joinWithMetadata(
  cleaned: Map<number, CleanedRecord>,
  metadata: Map<number, RawMetadata>
): Map<number, JoinedRecord> {
  const joined = new Map<number, JoinedRecord>();
  let noStation = 0;
  let missingField = 0;
  for (const [sensorId, record] of cleaned) {
    const place = locate(sensorId, metadata.get(sensorId));
    if (place === "no-station") noStation++;
    else if (place === "missing-field") missingField++;
    else joined.set(sensorId, { ...record, ...place });
  }
  if (noStation > 0 || missingField > 0) {
    console.log(`Left out ${noStation} sensor(s) without a station and ${missingField} with incomplete station metadata.`);
  }
  return joined;
}
