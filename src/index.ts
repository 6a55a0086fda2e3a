export { DeviceProject } from "./components/ProjectModel/ProjectModel";
export * from "./components/ProjectModel/ProjectModel.constants";
export type * from "./components/ProjectModel/ProjectModel.types";
export { isGroupId, isPadIndex, isPatternName } from "./components/ProjectModel/ProjectModel.utilities";

export {
  createDefaultSettingsRecord,
  encodePadRecord,
  encodePatternRecord,
  sortPatternEvents,
} from "./components/BinaryCodec/BinaryCodec.utilities";
export { MAX_PATTERN_EVENTS, PAD_RECORD_LENGTH, SETTINGS_RECORD_LENGTH } from "./components/BinaryCodec/BinaryCodec.constants";

export {
  buildProjectTar,
  loadProjectTemplate,
  saveProjectArchive,
} from "./components/ArchiveAssembler/ArchiveAssembler";
export type * from "./components/ArchiveAssembler/ArchiveAssembler.types";
export {
  createPakMetadata,
  createProjectArchiveFileName,
  formatGeneratedAt,
  getPadFilePath,
  getPatternFilePath,
  getProjectTarMemberPath,
  getSoundMemberPath,
} from "./components/ArchiveAssembler/ArchiveAssembler.utilities";

export { addBasicBeat, beatToTicks, createExampleProject } from "./components/ExampleBeat/ExampleBeat.utilities";
export type * from "./components/ExampleBeat/ExampleBeat.types";

export { CapacityExceededError, InvalidArgumentError } from "./shared/shared.errors";
