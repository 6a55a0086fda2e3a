export const PAD_RECORD_LENGTH = 27;
export const PAD_SAMPLE_NUMBER_OFFSET = 1;

export const SETTINGS_RECORD_LENGTH = 222;

export const PATTERN_HEADER_LENGTH = 4;
export const PATTERN_EVENT_LENGTH = 8;
export const MAX_PATTERN_EVENTS = 0xff;
export const PATTERN_HEADER_MARKER = 0x01;

// Device row index advances by 8 per pad.
export const PATTERN_ROW_STRIDE = 8;
// Standard playback column.
export const PATTERN_PLAYBACK_COLUMN = 0x3c;
export const PATTERN_EVENT_FLAGS = 0x10;
