import type { GroupId, PadIndex, PatternName } from "../ProjectModel/ProjectModel.types";
import type { PakMetadata } from "./ArchiveAssembler.types";

export const PADS_DIRECTORY_NAME = "pads";
export const PATTERNS_DIRECTORY_NAME = "patterns";
export const SETTINGS_FILE_NAME = "settings";
export const PROJECT_TAR_TOP_LEVEL_ENTRIES = [
  PADS_DIRECTORY_NAME,
  PATTERNS_DIRECTORY_NAME,
  SETTINGS_FILE_NAME,
] as const;

export const META_MEMBER_PATH = "/meta.json";
export const PROJECT_ARCHIVE_EXTENSION = ".ppak";
export const PROJECT_TAR_EXTENSION = ".tar";

export const PAK_INFO = "teenage engineering - pak file";
export const PAK_VERSION = 1;
export const PAK_TYPE = "user";
export const PAK_RELEASE = "1.2.0";
export const DEVICE_NAME = "EP-133";
export const DEVICE_VERSION = "2.0.5";
export const PAK_AUTHOR = "ppak-forge";

const formatTwoDigits = (value: number): string => {
  return String(value).padStart(2, "0");
};

export const formatPadFileName = (pad: PadIndex): string => {
  return `p${formatTwoDigits(pad)}`;
};

export const getPadFilePath = (groupId: GroupId, pad: PadIndex): string => {
  return `${PADS_DIRECTORY_NAME}/${groupId}/${formatPadFileName(pad)}`;
};

export const getPatternFilePath = (patternName: PatternName): string => {
  return `${PATTERNS_DIRECTORY_NAME}/${patternName}`;
};

// The device's archive reader expects every member path to start with "/".
export const getProjectTarMemberPath = (projectSlot: number): string => {
  return `/projects/P${formatTwoDigits(projectSlot)}${PROJECT_TAR_EXTENSION}`;
};

export const getSoundMemberPath = (fileName: string): string => {
  return `/sounds/${fileName}`;
};

export const formatGeneratedAt = (date: Date): string => {
  return `${date.toISOString().slice(0, 19)}.000Z`;
};

export const createPakMetadata = (deviceSku: string, generatedAt: Date): PakMetadata => {
  return {
    info: PAK_INFO,
    pak_version: PAK_VERSION,
    pak_type: PAK_TYPE,
    pak_release: PAK_RELEASE,
    device_name: DEVICE_NAME,
    device_sku: deviceSku,
    device_version: DEVICE_VERSION,
    generated_at: formatGeneratedAt(generatedAt),
    author: PAK_AUTHOR,
    base_sku: deviceSku,
  };
};

const sanitizeFileNamePart = (value: string): string => {
  const cleanedValue = value
    .trim()
    .replace(/[<>:"/\\|?*\u0000-\u001F]/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^\.+/, "")
    .replace(/\.+$/, "");

  return cleanedValue || "project";
};

export const createProjectArchiveFileName = (projectName: string): string => {
  const safeProjectName = sanitizeFileNamePart(projectName).slice(0, 80);
  return `${safeProjectName}${PROJECT_ARCHIVE_EXTENSION}`;
};
