import { CapacityExceededError } from "../../shared/shared.errors";
import type { PatternEvent } from "../ProjectModel/ProjectModel.types";
import {
  MAX_PATTERN_EVENTS,
  PAD_RECORD_LENGTH,
  PAD_SAMPLE_NUMBER_OFFSET,
  PATTERN_EVENT_FLAGS,
  PATTERN_EVENT_LENGTH,
  PATTERN_HEADER_LENGTH,
  PATTERN_HEADER_MARKER,
  PATTERN_PLAYBACK_COLUMN,
  PATTERN_ROW_STRIDE,
  SETTINGS_RECORD_LENGTH,
} from "./BinaryCodec.constants";

/**
 * Builds a pad file. Only the sample number at bytes 1-2 is written; every
 * other byte is copied from the template, or left zero without one.
 */
export const encodePadRecord = (
  sampleNumber: number,
  template?: Uint8Array | null
): Uint8Array => {
  const minimumLength = PAD_SAMPLE_NUMBER_OFFSET + 2;
  const record = template
    ? new Uint8Array(Math.max(template.length, minimumLength))
    : new Uint8Array(PAD_RECORD_LENGTH);

  if (template) {
    record.set(template);
  }

  const view = new DataView(record.buffer, record.byteOffset, record.byteLength);
  view.setUint16(PAD_SAMPLE_NUMBER_OFFSET, sampleNumber, true);
  return record;
};

export const sortPatternEvents = (events: readonly PatternEvent[]): PatternEvent[] => {
  return [...events].sort((left, right) => left.time - right.time);
};

export const encodePatternRecord = (events: readonly PatternEvent[]): Uint8Array => {
  if (events.length === 0) {
    return Uint8Array.of(0x00, PATTERN_HEADER_MARKER, 0x00, 0x00);
  }

  const sortedEvents = sortPatternEvents(events);
  if (sortedEvents.length > MAX_PATTERN_EVENTS) {
    throw new CapacityExceededError(
      `Too many events: ${sortedEvents.length}. Maximum is ${MAX_PATTERN_EVENTS}`,
      MAX_PATTERN_EVENTS,
      sortedEvents.length
    );
  }

  const record = new Uint8Array(PATTERN_HEADER_LENGTH + sortedEvents.length * PATTERN_EVENT_LENGTH);
  const view = new DataView(record.buffer);
  view.setUint8(1, PATTERN_HEADER_MARKER);
  view.setUint8(2, sortedEvents.length);

  let offset = PATTERN_HEADER_LENGTH;
  for (const event of sortedEvents) {
    view.setUint16(offset, event.time, true);
    view.setUint8(offset + 2, (event.pad - 1) * PATTERN_ROW_STRIDE);
    view.setUint8(offset + 3, PATTERN_PLAYBACK_COLUMN);
    view.setUint8(offset + 4, event.velocity);
    view.setUint8(offset + 5, PATTERN_EVENT_FLAGS);
    offset += PATTERN_EVENT_LENGTH;
  }

  return record;
};

export const createDefaultSettingsRecord = (): Uint8Array => {
  return new Uint8Array(SETTINGS_RECORD_LENGTH);
};
