import type { PercussionDefaults, PercussionRole } from "./ProjectModel.types";

export const GROUP_IDS = ["a", "b", "c", "d"] as const;
export const PAD_INDICES = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] as const;
export const PATTERN_NAMES = ["a01", "b01", "c01", "d01"] as const;

export const PADS_PER_GROUP = PAD_INDICES.length;
export const MIN_PROJECT_SLOT = 1;
export const MAX_PROJECT_SLOT = 9;
export const MAX_SAMPLE_NUMBER = 0xffff;
export const MAX_VELOCITY = 127;
export const DEFAULT_EVENT_VELOCITY = 100;

// One 4/4 bar.
export const TICKS_PER_BAR = 384;
export const TICKS_PER_BEAT = 96;
export const TICKS_PER_8TH = 48;
export const TICKS_PER_16TH = 24;
export const TICKS_PER_32ND = 12;
export const MAX_EVENT_TIME = TICKS_PER_BAR - 1;

export const PERCUSSION_DEFAULTS: Record<PercussionRole, PercussionDefaults> = {
  kick: { pad: 10, velocity: 127 },
  snare: { pad: 7, velocity: 120 },
  hihat: { pad: 5, velocity: 90 },
};
