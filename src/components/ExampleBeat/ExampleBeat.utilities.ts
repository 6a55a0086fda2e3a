import { DeviceProject } from "../ProjectModel/ProjectModel";
import {
  PERCUSSION_DEFAULTS,
  TICKS_PER_8TH,
  TICKS_PER_BEAT,
} from "../ProjectModel/ProjectModel.constants";
import type { BasicBeatOptions, ExampleProjectOptions } from "./ExampleBeat.types";

const HIHAT_ACCENT_VELOCITY = 90;
const HIHAT_OFFBEAT_VELOCITY = 70;
const HIHATS_PER_BAR = 8;

export const EXAMPLE_SAMPLE_NUMBERS = {
  kick: 1,
  snare: 100,
  hihat: 200,
} as const;

/** Beat 1 is tick 0; fractional beats truncate toward zero. */
export const beatToTicks = (beat: number): number => {
  return Math.trunc((beat - 1) * TICKS_PER_BEAT);
};

/**
 * Kick on 1 and 3, snare on 2 and 4, closed hats on every eighth with the
 * downbeats accented.
 */
export const addBasicBeat = (
  project: DeviceProject,
  {
    pattern = "a01",
    kickPad = PERCUSSION_DEFAULTS.kick.pad,
    snarePad = PERCUSSION_DEFAULTS.snare.pad,
    hihatPad = PERCUSSION_DEFAULTS.hihat.pad,
  }: BasicBeatOptions = {}
): void => {
  project.addKick(pattern, beatToTicks(1), kickPad);
  project.addKick(pattern, beatToTicks(3), kickPad);

  project.addSnare(pattern, beatToTicks(2), snarePad);
  project.addSnare(pattern, beatToTicks(4), snarePad);

  for (let index = 0; index < HIHATS_PER_BAR; index += 1) {
    const velocity = index % 2 === 0 ? HIHAT_ACCENT_VELOCITY : HIHAT_OFFBEAT_VELOCITY;
    project.addHihat(pattern, index * TICKS_PER_8TH, hihatPad, velocity);
  }
};

export const createExampleProject = (options: ExampleProjectOptions = {}): DeviceProject => {
  const project = new DeviceProject(options);

  project.assignSample("a", PERCUSSION_DEFAULTS.kick.pad, EXAMPLE_SAMPLE_NUMBERS.kick);
  project.assignSample("a", PERCUSSION_DEFAULTS.snare.pad, EXAMPLE_SAMPLE_NUMBERS.snare);
  project.assignSample("a", PERCUSSION_DEFAULTS.hihat.pad, EXAMPLE_SAMPLE_NUMBERS.hihat);
  addBasicBeat(project);

  return project;
};
