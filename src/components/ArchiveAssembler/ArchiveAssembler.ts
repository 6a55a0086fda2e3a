import JSZip from "jszip";
import { readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createDebugLogger } from "../../shared/shared.logger";
import {
  collectTarEntries,
  compareFileNames,
  listAudioAssetFiles,
  readOptionalFile,
  withScratchDirectory,
  writeBinaryFile,
} from "../../integrations/file-system/file-system.utilities";
import { extractTarArchive, packTarArchive } from "../../integrations/tar/tar.utilities";
import {
  createDefaultSettingsRecord,
  encodePadRecord,
  encodePatternRecord,
} from "../BinaryCodec/BinaryCodec.utilities";
import { GROUP_IDS, PAD_INDICES, PATTERN_NAMES } from "../ProjectModel/ProjectModel.constants";
import type { ProjectSnapshot, ProjectTemplate } from "../ProjectModel/ProjectModel.types";
import { countTemplatePads, createEmptyTemplatePads } from "../ProjectModel/ProjectModel.utilities";
import type {
  SaveProjectArchiveOptions,
  SaveProjectArchiveResult,
} from "./ArchiveAssembler.types";
import {
  META_MEMBER_PATH,
  PROJECT_TAR_EXTENSION,
  PROJECT_TAR_TOP_LEVEL_ENTRIES,
  SETTINGS_FILE_NAME,
  createPakMetadata,
  getPadFilePath,
  getPatternFilePath,
  getProjectTarMemberPath,
  getSoundMemberPath,
} from "./ArchiveAssembler.utilities";

const log = createDebugLogger("ppak-archive");

type TemplateFileReader = (relativePath: string) => Promise<Uint8Array | null>;

const readProjectTemplate = async (readTemplateFile: TemplateFileReader): Promise<ProjectTemplate> => {
  const pads = createEmptyTemplatePads();

  for (const groupId of GROUP_IDS) {
    for (const pad of PAD_INDICES) {
      const padBytes = await readTemplateFile(getPadFilePath(groupId, pad));
      if (padBytes) {
        pads[groupId][pad] = padBytes;
      }
    }
  }

  return {
    pads,
    settings: await readTemplateFile(SETTINGS_FILE_NAME),
  };
};

const readTemplateFromContainer = async (containerBytes: Uint8Array): Promise<ProjectTemplate> => {
  const zip = await JSZip.loadAsync(containerBytes);
  const tarMemberName = Object.keys(zip.files)
    .filter((memberName) => !zip.files[memberName].dir && memberName.endsWith(PROJECT_TAR_EXTENSION))
    .sort(compareFileNames)[0];

  if (!tarMemberName) {
    throw new Error("Invalid project archive: missing project tar.");
  }

  const tarBytes = await zip.files[tarMemberName].async("uint8array");
  const filesByName = new Map(
    extractTarArchive(tarBytes)
      .filter((entry) => entry.type === "file")
      .map((entry) => [entry.name, entry.data] as const)
  );

  return readProjectTemplate(async (relativePath) => filesByName.get(relativePath) ?? null);
};

/**
 * Captures pad and settings bytes from an earlier project, either a `.ppak`
 * container or a directory holding an extracted project tar. Files that are
 * missing from the source are left out of the template.
 */
export const loadProjectTemplate = async (sourcePath: string): Promise<ProjectTemplate> => {
  const sourceStats = await stat(sourcePath);
  const template = sourceStats.isDirectory()
    ? await readProjectTemplate((relativePath) => readOptionalFile(join(sourcePath, relativePath)))
    : await readTemplateFromContainer(await readFile(sourcePath));

  log("template-loaded", {
    sourcePath,
    padCount: countTemplatePads(template),
    hasSettings: template.settings !== null,
  });

  return template;
};

const writeProjectTree = async (snapshot: ProjectSnapshot, rootDirectory: string): Promise<void> => {
  const { padAssignments, patterns, template } = snapshot;

  for (const groupId of GROUP_IDS) {
    for (const pad of PAD_INDICES) {
      const padRecord = encodePadRecord(padAssignments[groupId][pad] ?? 0, template?.pads[groupId][pad]);
      await writeBinaryFile(join(rootDirectory, getPadFilePath(groupId, pad)), padRecord);
    }
  }

  for (const patternName of PATTERN_NAMES) {
    await writeBinaryFile(
      join(rootDirectory, getPatternFilePath(patternName)),
      encodePatternRecord(patterns[patternName])
    );
  }

  const templateSettings = template?.settings;
  await writeBinaryFile(
    join(rootDirectory, SETTINGS_FILE_NAME),
    templateSettings && templateSettings.length > 0 ? templateSettings : createDefaultSettingsRecord()
  );
};

export const buildProjectTar = async (
  snapshot: ProjectSnapshot,
  modifiedAt: Date = new Date()
): Promise<Buffer> => {
  return withScratchDirectory(async (scratchDirectory) => {
    await writeProjectTree(snapshot, scratchDirectory);
    const tarEntries = await collectTarEntries(scratchDirectory, PROJECT_TAR_TOP_LEVEL_ENTRIES);
    return packTarArchive(tarEntries, { modifiedAt });
  });
};

/**
 * Writes the `.ppak` container: the project tar, `meta.json` and any `.wav`
 * files from `soundsDir`. Reads the snapshot only, so it can be repeated.
 */
export const saveProjectArchive = async (
  snapshot: ProjectSnapshot,
  outputPath: string,
  { soundsDir, generatedAt = new Date() }: SaveProjectArchiveOptions = {}
): Promise<SaveProjectArchiveResult> => {
  const projectTar = await buildProjectTar(snapshot, generatedAt);
  const zip = new JSZip();
  const memberPaths: string[] = [];

  const addMember = (memberPath: string, data: Uint8Array | string) => {
    zip.file(memberPath, data, {
      compression: "DEFLATE",
      createFolders: false,
      date: generatedAt,
    });
    memberPaths.push(memberPath);
  };

  addMember(getProjectTarMemberPath(snapshot.projectSlot), projectTar);
  addMember(
    META_MEMBER_PATH,
    JSON.stringify(createPakMetadata(snapshot.deviceSku, generatedAt), null, 2)
  );

  if (soundsDir) {
    for (const audioAsset of await listAudioAssetFiles(soundsDir)) {
      addMember(getSoundMemberPath(audioAsset.fileName), await readFile(audioAsset.absolutePath));
    }
  }

  const containerBytes = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  await writeFile(outputPath, containerBytes);

  log("archive-saved", {
    outputPath,
    memberCount: memberPaths.length,
    tarBytes: projectTar.length,
    containerBytes: containerBytes.length,
  });

  return { outputPath, memberPaths };
};
