import test from "node:test";
import assert from "node:assert/strict";

import { cleanMeasurement, cleanMeasurements, joinWithMetadata, parseCommaDecimal, type CleanedRecord } from "../cleanData.js";
import { DataFormatError } from "../errors.js";
import type { RawMetadata } from "../mivXml.js";

function reading(overrides: Record<string, string> = {}): Record<string, string> {
  return { defect: "", beschikbaar: "1", geldig: "0", voertuigsnelheid_rekenkundig: "42", ...overrides };
}

function station(overrides: Record<string, string> = {}): RawMetadata {
  return {
    volledige_naam: "Main St",
    Rijstrook: "1",
    lengtegraad_EPSG_4326: "3,21",
    breedtegraad_EPSG_4326: "51,05",
    ...overrides,
  };
}

// ─── Cleaner ────────────────────────────────────────────────────────────────

test("cleanMeasurement: empty defect with codes at most 1 is working", () => {
  assert.deepEqual(cleanMeasurement(1, reading()), { speed: 42, working: true });
});

test("cleanMeasurement: missing defect field counts as not defective", () => {
  const { defect: _defect, ...withoutDefect } = reading();
  assert.equal(cleanMeasurement(1, withoutDefect).working, true);
});

test("cleanMeasurement: any defect text means not working", () => {
  assert.equal(cleanMeasurement(1, reading({ defect: "1" })).working, false);
  assert.equal(cleanMeasurement(1, reading({ defect: "0" })).working, false);
});

test("cleanMeasurement: availability or validity code above 1 means not working", () => {
  assert.equal(cleanMeasurement(1, reading({ beschikbaar: "2" })).working, false);
  assert.equal(cleanMeasurement(1, reading({ geldig: "3" })).working, false);
  assert.equal(cleanMeasurement(1, reading({ beschikbaar: "1", geldig: "1" })).working, true);
});

test("cleanMeasurement: speed is parsed as an integer", () => {
  assert.equal(cleanMeasurement(1, reading({ voertuigsnelheid_rekenkundig: " 97 " })).speed, 97);
  assert.equal(cleanMeasurement(1, reading({ voertuigsnelheid_rekenkundig: "0" })).speed, 0);
});

test("cleanMeasurement: non-numeric speed raises DataFormatError naming sensor and field", () => {
  assert.throws(
    () => cleanMeasurement(12, reading({ voertuigsnelheid_rekenkundig: "n/a" })),
    (err: unknown) =>
      err instanceof DataFormatError &&
      err.sensorId === 12 &&
      err.field === "voertuigsnelheid_rekenkundig" &&
      err.message === 'Sensor 12 has non-numeric voertuigsnelheid_rekenkundig: "n/a"'
  );
});

test("cleanMeasurement: missing status code raises DataFormatError", () => {
  const { geldig: _geldig, ...withoutValidity } = reading();
  assert.throws(
    () => cleanMeasurement(4, withoutValidity),
    (err: unknown) => err instanceof DataFormatError && err.message === "Sensor 4 has no geldig field"
  );
});

test("cleanMeasurements: one cleaned record per input key", () => {
  const cleaned = cleanMeasurements(
    new Map([
      [5, reading()],
      [7, reading({ defect: "1", voertuigsnelheid_rekenkundig: "100" })],
    ])
  );
  assert.deepEqual([...cleaned.entries()], [
    [5, { speed: 42, working: true }],
    [7, { speed: 100, working: false }],
  ]);
});

// ─── Joiner ─────────────────────────────────────────────────────────────────

test("parseCommaDecimal: comma decimal separator becomes a dot", () => {
  assert.equal(parseCommaDecimal("51,21"), 51.21);
  assert.equal(parseCommaDecimal("3.5"), 3.5);
  assert.equal(parseCommaDecimal(""), null);
  assert.equal(parseCommaDecimal("abc"), null);
});

test("joinWithMetadata: attaches coordinates, name and lane", () => {
  const joined = joinWithMetadata(new Map([[5, { speed: 42, working: true }]]), new Map([[5, station()]]));
  assert.deepEqual(joined.get(5), {
    speed: 42,
    working: true,
    longitude: 3.21,
    latitude: 51.05,
    location: "Main St",
    lane: "1",
  });
});

test("joinWithMetadata: keeps only sensors present in both sets", () => {
  const cleaned = new Map<number, CleanedRecord>([
    [5, { speed: 42, working: true }],
    [7, { speed: 97, working: true }],
  ]);
  const joined = joinWithMetadata(cleaned, new Map([[5, station()], [9, station({ volledige_naam: "Side Rd" })]]));
  assert.deepEqual([...joined.keys()], [5]);
});

test("joinWithMetadata: station without one of the required fields drops the sensor", () => {
  const { Rijstrook: _lane, ...withoutLane } = station();
  const cleaned = new Map<number, CleanedRecord>([
    [1, { speed: 10, working: true }],
    [3, { speed: 30, working: false }],
  ]);
  const joined = joinWithMetadata(cleaned, new Map([[1, withoutLane], [3, station()]]));
  assert.deepEqual([...joined.keys()], [3]);
});

test("joinWithMetadata: logs sensors left out per reason", (t) => {
  const log = t.mock.method(console, "log", () => {});
  const { volledige_naam: _name, ...withoutName } = station();
  const cleaned = new Map<number, CleanedRecord>([
    [1, { speed: 10, working: true }],
    [2, { speed: 20, working: true }],
    [3, { speed: 30, working: true }],
  ]);
  joinWithMetadata(cleaned, new Map([[2, withoutName], [3, station()]]));
  assert.equal(log.mock.callCount(), 1);
  assert.deepEqual(log.mock.calls[0]?.arguments, [
    "Left out 1 sensor(s) without a station and 1 with incomplete station metadata.",
  ]);
});

test("joinWithMetadata: empty coordinate raises DataFormatError naming sensor and field", () => {
  assert.throws(
    () =>
      joinWithMetadata(
        new Map([[2, { speed: 20, working: true }]]),
        new Map([[2, station({ breedtegraad_EPSG_4326: "" })]])
      ),
    (err: unknown) =>
      err instanceof DataFormatError &&
      err.sensorId === 2 &&
      err.field === "breedtegraad_EPSG_4326" &&
      err.message === 'Sensor 2 has non-numeric breedtegraad_EPSG_4326: ""'
  );
});

test("joinWithMetadata: non-numeric coordinate aborts instead of dropping the sensor", () => {
  assert.throws(
    () =>
      joinWithMetadata(
        new Map([[5, { speed: 42, working: true }]]),
        new Map([[5, station({ lengtegraad_EPSG_4326: "3,2,1", breedtegraad_EPSG_4326: "n/a" })]])
      ),
    (err: unknown) => err instanceof DataFormatError && err.sensorId === 5 && err.field === "lengtegraad_EPSG_4326"
  );
});

test("joinWithMetadata: does not modify the cleaned map", () => {
  const cleaned = new Map<number, CleanedRecord>([
    [5, { speed: 42, working: true }],
    [7, { speed: 97, working: true }],
  ]);
  joinWithMetadata(cleaned, new Map([[5, station()]]));
  assert.deepEqual([...cleaned.entries()], [
    [5, { speed: 42, working: true }],
    [7, { speed: 97, working: true }],
  ]);
});
