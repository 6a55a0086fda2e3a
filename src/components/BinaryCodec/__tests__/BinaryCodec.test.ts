import { describe, expect, it } from "vitest";
import { CapacityExceededError } from "../../../shared/shared.errors";
import type { PadIndex, PatternEvent } from "../../ProjectModel/ProjectModel.types";
import {
  createDefaultSettingsRecord,
  encodePadRecord,
  encodePatternRecord,
  sortPatternEvents,
} from "../BinaryCodec.utilities";

const readUint16LE = (bytes: Uint8Array, offset: number): number => {
  return bytes[offset] | (bytes[offset + 1] << 8);
};

const event = (time: number, pad: PadIndex, velocity: number): PatternEvent => ({
  time,
  pad,
  velocity,
});

describe("encodePadRecord", () => {
  it("writes the sample number into a zero-filled 27-byte record", () => {
    const record = encodePadRecord(0x1234);

    expect(record.length).toBe(27);
    expect(record[0]).toBe(0);
    expect(record[1]).toBe(0x34);
    expect(record[2]).toBe(0x12);
    expect(Array.from(record.subarray(3)).every((byte) => byte === 0)).toBe(true);
  });

  it("keeps every template byte except offsets 1-2", () => {
    const template = Uint8Array.from({ length: 40 }, (_, index) => index + 100);
    const record = encodePadRecord(405, template);

    expect(record.length).toBe(40);
    expect(readUint16LE(record, 1)).toBe(405);
    expect(record[0]).toBe(100);
    expect(Array.from(record.subarray(3))).toEqual(Array.from(template.subarray(3)));
  });

  it("does not modify the template buffer it was given", () => {
    const template = new Uint8Array(27).fill(0xaa);
    encodePadRecord(1, template);
    expect(template[1]).toBe(0xaa);
    expect(template[2]).toBe(0xaa);
  });

  it("zero-extends templates too short to hold the sample number", () => {
    const record = encodePadRecord(0xbeef, Uint8Array.of(0x07));
    expect(Array.from(record)).toEqual([0x07, 0xef, 0xbe]);
  });

  it("encodes the full unsigned 16-bit range", () => {
    expect(readUint16LE(encodePadRecord(0), 1)).toBe(0);
    expect(readUint16LE(encodePadRecord(65535), 1)).toBe(65535);
  });
});

describe("encodePatternRecord", () => {
  it("emits only the placeholder header for an empty pattern", () => {
    expect(Array.from(encodePatternRecord([]))).toEqual([0x00, 0x01, 0x00, 0x00]);
  });

  it("encodes a single event", () => {
    const record = encodePatternRecord([event(300, 12, 99)]);

    expect(Array.from(record)).toEqual([
      0x00, 0x01, 0x01, 0x00,
      0x2c, 0x01, 0x58, 0x3c, 0x63, 0x10, 0x00, 0x00,
    ]);
  });

  it("sorts events by time and keeps insertion order for ties", () => {
    const record = encodePatternRecord([
      event(96, 7, 120),
      event(0, 10, 127),
      event(96, 5, 70),
      event(0, 5, 90),
    ]);

    expect(record.length).toBe(4 + 4 * 8);
    expect(record[2]).toBe(4);

    const decoded = Array.from({ length: 4 }, (_, index) => {
      const offset = 4 + index * 8;
      return [readUint16LE(record, offset), record[offset + 2] / 8 + 1, record[offset + 4]];
    });

    expect(decoded).toEqual([
      [0, 10, 127],
      [0, 5, 90],
      [96, 7, 120],
      [96, 5, 70],
    ]);
  });

  it("maps pad 1 to row 0 and pad 12 to row 88", () => {
    const record = encodePatternRecord([event(0, 1, 1), event(1, 12, 1)]);
    expect(record[4 + 2]).toBe(0);
    expect(record[12 + 2]).toBe(88);
  });

  it("accepts exactly 255 events", () => {
    const events = Array.from({ length: 255 }, (_, index) => event(index, 1, 64));
    const record = encodePatternRecord(events);

    expect(record.length).toBe(4 + 255 * 8);
    expect(record[2]).toBe(255);
  });

  it("rejects more than 255 events", () => {
    const events = Array.from({ length: 256 }, () => event(0, 1, 64));
    expect(() => encodePatternRecord(events)).toThrow(CapacityExceededError);
    expect(() => encodePatternRecord(events)).toThrow("Too many events: 256. Maximum is 255");
  });
});

describe("sortPatternEvents", () => {
  it("returns a new array and leaves the input untouched", () => {
    const events = [event(48, 5, 90), event(0, 5, 90)];
    const sorted = sortPatternEvents(events);

    expect(sorted.map((entry) => entry.time)).toEqual([0, 48]);
    expect(events.map((entry) => entry.time)).toEqual([48, 0]);
  });
});

describe("createDefaultSettingsRecord", () => {
  it("is 222 zero bytes", () => {
    const settings = createDefaultSettingsRecord();
    expect(settings.length).toBe(222);
    expect(settings.every((byte) => byte === 0)).toBe(true);
  });
});
