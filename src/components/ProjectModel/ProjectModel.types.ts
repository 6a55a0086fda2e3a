import type { GROUP_IDS, PAD_INDICES, PATTERN_NAMES } from "./ProjectModel.constants";

export type GroupId = (typeof GROUP_IDS)[number];
export type PadIndex = (typeof PAD_INDICES)[number];
export type PatternName = (typeof PATTERN_NAMES)[number];

export interface PatternEvent {
  time: number;
  pad: PadIndex;
  velocity: number;
}

export type GroupPadAssignments = Partial<Record<PadIndex, number>>;
export type PadAssignments = Record<GroupId, GroupPadAssignments>;
export type ProjectPatterns = Record<PatternName, PatternEvent[]>;

export type GroupTemplatePads = Partial<Record<PadIndex, Uint8Array>>;
export type TemplatePads = Record<GroupId, GroupTemplatePads>;

export interface ProjectTemplate {
  pads: TemplatePads;
  settings: Uint8Array | null;
}

export interface DeviceProjectOptions {
  deviceSku?: string;
  projectSlot?: number;
}

export interface ProjectSnapshot {
  deviceSku: string;
  projectSlot: number;
  padAssignments: PadAssignments;
  patterns: ProjectPatterns;
  template: ProjectTemplate | null;
}

export type PercussionRole = "kick" | "snare" | "hihat";

export interface PercussionDefaults {
  pad: PadIndex;
  velocity: number;
}
