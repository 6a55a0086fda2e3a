import type { DeviceProjectOptions } from "../ProjectModel/ProjectModel.types";

export interface BasicBeatOptions {
  pattern?: string;
  kickPad?: number;
  snarePad?: number;
  hihatPad?: number;
}

export type ExampleProjectOptions = DeviceProjectOptions;
