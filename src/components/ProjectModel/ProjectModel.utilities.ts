import { InvalidArgumentError } from "../../shared/shared.errors";
import {
  GROUP_IDS,
  MAX_PROJECT_SLOT,
  MIN_PROJECT_SLOT,
  PAD_INDICES,
  PATTERN_NAMES,
} from "./ProjectModel.constants";
import type {
  GroupId,
  PadAssignments,
  PadIndex,
  PatternName,
  ProjectPatterns,
  ProjectTemplate,
  TemplatePads,
} from "./ProjectModel.types";

export const isGroupId = (value: unknown): value is GroupId => {
  return GROUP_IDS.some((groupId) => groupId === value);
};

export const isPadIndex = (value: unknown): value is PadIndex => {
  return PAD_INDICES.some((padIndex) => padIndex === value);
};

export const isPatternName = (value: unknown): value is PatternName => {
  return PATTERN_NAMES.some((patternName) => patternName === value);
};

export const isIntegerInRange = (value: number, min: number, max: number): boolean => {
  return Number.isInteger(value) && value >= min && value <= max;
};

export const requireGroupId = (value: string): GroupId => {
  if (!isGroupId(value)) {
    throw new InvalidArgumentError(`Invalid group: ${value}. Must be 'a', 'b', 'c', or 'd'`);
  }

  return value;
};

export const requirePadIndex = (value: number): PadIndex => {
  if (!isPadIndex(value)) {
    throw new InvalidArgumentError(`Invalid pad: ${value}. Must be 1-12`);
  }

  return value;
};

export const requirePatternName = (value: string): PatternName => {
  if (!isPatternName(value)) {
    throw new InvalidArgumentError(`Invalid pattern: ${value}. Must be a01, b01, c01, or d01`);
  }

  return value;
};

export const requireIntegerInRange = (
  label: string,
  value: number,
  min: number,
  max: number
): number => {
  if (!isIntegerInRange(value, min, max)) {
    throw new InvalidArgumentError(`Invalid ${label}: ${value}. Must be ${min}-${max}`);
  }

  return value;
};

export const requireDeviceSku = (value: string): string => {
  const deviceSku = value.trim();
  if (!deviceSku) {
    throw new InvalidArgumentError("Invalid device SKU: must not be empty");
  }

  return deviceSku;
};

export const requireProjectSlot = (value: number): number => {
  return requireIntegerInRange("project slot", value, MIN_PROJECT_SLOT, MAX_PROJECT_SLOT);
};

export const createEmptyPadAssignments = (): PadAssignments => {
  return { a: {}, b: {}, c: {}, d: {} };
};

export const createEmptyPatterns = (): ProjectPatterns => {
  return { a01: [], b01: [], c01: [], d01: [] };
};

export const createEmptyTemplatePads = (): TemplatePads => {
  return { a: {}, b: {}, c: {}, d: {} };
};

export const clonePadAssignments = (padAssignments: PadAssignments): PadAssignments => {
  return {
    a: { ...padAssignments.a },
    b: { ...padAssignments.b },
    c: { ...padAssignments.c },
    d: { ...padAssignments.d },
  };
};

export const clonePatterns = (patterns: ProjectPatterns): ProjectPatterns => {
  return {
    a01: patterns.a01.map((event) => ({ ...event })),
    b01: patterns.b01.map((event) => ({ ...event })),
    c01: patterns.c01.map((event) => ({ ...event })),
    d01: patterns.d01.map((event) => ({ ...event })),
  };
};

export const cloneProjectTemplate = (template: ProjectTemplate): ProjectTemplate => {
  const pads = createEmptyTemplatePads();

  GROUP_IDS.forEach((groupId) => {
    PAD_INDICES.forEach((padIndex) => {
      const padBytes = template.pads[groupId][padIndex];
      if (padBytes) {
        pads[groupId][padIndex] = Uint8Array.from(padBytes);
      }
    });
  });

  return {
    pads,
    settings: template.settings ? Uint8Array.from(template.settings) : null,
  };
};

export const countTemplatePads = (template: ProjectTemplate): number => {
  return GROUP_IDS.reduce(
    (total, groupId) => total + Object.keys(template.pads[groupId]).length,
    0
  );
};
