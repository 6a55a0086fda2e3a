import { DEFAULT_DEVICE_SKU } from "../../shared/shared.config";
import { loadProjectTemplate, saveProjectArchive } from "../ArchiveAssembler/ArchiveAssembler";
import type {
  SaveProjectArchiveOptions,
  SaveProjectArchiveResult,
} from "../ArchiveAssembler/ArchiveAssembler.types";
import {
  DEFAULT_EVENT_VELOCITY,
  MAX_EVENT_TIME,
  MAX_SAMPLE_NUMBER,
  MAX_VELOCITY,
  PERCUSSION_DEFAULTS,
} from "./ProjectModel.constants";
import type {
  DeviceProjectOptions,
  PadAssignments,
  PatternEvent,
  ProjectPatterns,
  ProjectSnapshot,
  ProjectTemplate,
} from "./ProjectModel.types";
import {
  clonePadAssignments,
  clonePatterns,
  cloneProjectTemplate,
  createEmptyPadAssignments,
  createEmptyPatterns,
  requireDeviceSku,
  requireGroupId,
  requireIntegerInRange,
  requirePadIndex,
  requirePatternName,
  requireProjectSlot,
} from "./ProjectModel.utilities";

/**
 * An EP-133 project in memory: pad to sample assignments for groups a-d and
 * one bar of events for each of the four patterns.
 *
 * Every mutating call validates its arguments and throws
 * `InvalidArgumentError` before touching state.
 */
export class DeviceProject {
  readonly deviceSku: string;
  readonly projectSlot: number;
  private readonly padAssignments: PadAssignments = createEmptyPadAssignments();
  private readonly patterns: ProjectPatterns = createEmptyPatterns();
  private template: ProjectTemplate | null = null;

  constructor({ deviceSku = DEFAULT_DEVICE_SKU, projectSlot = 1 }: DeviceProjectOptions = {}) {
    this.deviceSku = requireDeviceSku(deviceSku);
    this.projectSlot = requireProjectSlot(projectSlot);
  }

  /** Points a pad at a sample number; 0 leaves the pad empty. */
  assignSample(group: string, pad: number, sampleNumber: number): void {
    const groupId = requireGroupId(group);
    const padIndex = requirePadIndex(pad);
    requireIntegerInRange("sample number", sampleNumber, 0, MAX_SAMPLE_NUMBER);

    this.padAssignments[groupId][padIndex] = sampleNumber;
  }

  addEvent(pattern: string, time: number, pad: number, velocity: number = DEFAULT_EVENT_VELOCITY): void {
    const patternName = requirePatternName(pattern);
    requireIntegerInRange("time", time, 0, MAX_EVENT_TIME);
    const padIndex = requirePadIndex(pad);
    requireIntegerInRange("velocity", velocity, 0, MAX_VELOCITY);

    this.patterns[patternName].push({ time, pad: padIndex, velocity });
  }

  addKick(
    pattern: string,
    time: number,
    pad: number = PERCUSSION_DEFAULTS.kick.pad,
    velocity: number = PERCUSSION_DEFAULTS.kick.velocity
  ): void {
    this.addEvent(pattern, time, pad, velocity);
  }

  addSnare(
    pattern: string,
    time: number,
    pad: number = PERCUSSION_DEFAULTS.snare.pad,
    velocity: number = PERCUSSION_DEFAULTS.snare.velocity
  ): void {
    this.addEvent(pattern, time, pad, velocity);
  }

  addHihat(
    pattern: string,
    time: number,
    pad: number = PERCUSSION_DEFAULTS.hihat.pad,
    velocity: number = PERCUSSION_DEFAULTS.hihat.velocity
  ): void {
    this.addEvent(pattern, time, pad, velocity);
  }

  getSampleNumber(group: string, pad: number): number {
    return this.padAssignments[requireGroupId(group)][requirePadIndex(pad)] ?? 0;
  }

  getPatternEvents(pattern: string): readonly PatternEvent[] {
    return this.patterns[requirePatternName(pattern)].map((event) => ({ ...event }));
  }

  getTemplate(): ProjectTemplate | null {
    return this.template ? cloneProjectTemplate(this.template) : null;
  }

  /** Replaces any template captured earlier. */
  applyTemplate(template: ProjectTemplate): void {
    this.template = cloneProjectTemplate(template);
  }

  async loadTemplate(sourcePath: string): Promise<ProjectTemplate> {
    const template = await loadProjectTemplate(sourcePath);
    this.applyTemplate(template);
    return template;
  }

  toSnapshot(): ProjectSnapshot {
    return {
      deviceSku: this.deviceSku,
      projectSlot: this.projectSlot,
      padAssignments: clonePadAssignments(this.padAssignments),
      patterns: clonePatterns(this.patterns),
      template: this.getTemplate(),
    };
  }

  save(outputPath: string, options?: SaveProjectArchiveOptions): Promise<SaveProjectArchiveResult> {
    return saveProjectArchive(this.toSnapshot(), outputPath, options);
  }
}
