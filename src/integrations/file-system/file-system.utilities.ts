import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { isNodeErrorWithCode } from "../../shared/shared.errors";
import type { TarEntry } from "../tar/tar.types";
import type { AudioAssetFile } from "./file-system.types";

export const AUDIO_ASSET_EXTENSION = ".wav";
const SCRATCH_DIRECTORY_PREFIX = "ppak-";

export const compareFileNames = (left: string, right: string): number => {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
};

export const isAudioAssetFileName = (fileName: string): boolean => {
  return fileName.toLowerCase().endsWith(AUDIO_ASSET_EXTENSION);
};

export const withScratchDirectory = async <T>(
  action: (scratchDirectory: string) => Promise<T>
): Promise<T> => {
  const scratchDirectory = await mkdtemp(join(tmpdir(), SCRATCH_DIRECTORY_PREFIX));
  try {
    return await action(scratchDirectory);
  } finally {
    await rm(scratchDirectory, { recursive: true, force: true });
  }
};

export const writeBinaryFile = async (filePath: string, data: Uint8Array): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, data);
};

export const readOptionalFile = async (filePath: string): Promise<Buffer | null> => {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
};

const walkDirectoryForTarEntries = async (
  rootDirectory: string,
  pathSegments: string[],
  collectedEntries: TarEntry[]
): Promise<void> => {
  const directoryEntries = await readdir(join(rootDirectory, ...pathSegments), {
    withFileTypes: true,
  });
  directoryEntries.sort((left, right) => compareFileNames(left.name, right.name));

  for (const directoryEntry of directoryEntries) {
    const nextPathSegments = [...pathSegments, directoryEntry.name];
    const name = nextPathSegments.join("/");

    if (directoryEntry.isDirectory()) {
      collectedEntries.push({ name, type: "directory", data: Buffer.alloc(0) });
      await walkDirectoryForTarEntries(rootDirectory, nextPathSegments, collectedEntries);
      continue;
    }

    if (directoryEntry.isFile()) {
      collectedEntries.push({
        name,
        type: "file",
        data: await readFile(join(rootDirectory, ...nextPathSegments)),
      });
    }
  }
};

/**
 * Collects tar entries for each named top-level path under `rootDirectory`,
 * in the order given. Directories are walked recursively with their children
 * sorted by name.
 */
export const collectTarEntries = async (
  rootDirectory: string,
  topLevelNames: readonly string[]
): Promise<TarEntry[]> => {
  const collectedEntries: TarEntry[] = [];
  const topLevelEntries = await readdir(rootDirectory, { withFileTypes: true });

  for (const topLevelName of topLevelNames) {
    const topLevelEntry = topLevelEntries.find((entry) => entry.name === topLevelName);
    if (!topLevelEntry) {
      throw new Error(`Missing archive entry: ${topLevelName}`);
    }

    if (topLevelEntry.isDirectory()) {
      collectedEntries.push({ name: topLevelName, type: "directory", data: Buffer.alloc(0) });
      await walkDirectoryForTarEntries(rootDirectory, [topLevelName], collectedEntries);
      continue;
    }

    collectedEntries.push({
      name: topLevelName,
      type: "file",
      data: await readFile(join(rootDirectory, topLevelName)),
    });
  }

  return collectedEntries;
};

export const listAudioAssetFiles = async (directory: string): Promise<AudioAssetFile[]> => {
  const directoryEntries = await readdir(directory, { withFileTypes: true });

  return directoryEntries
    .filter((entry) => entry.isFile() && isAudioAssetFileName(entry.name))
    .map((entry) => entry.name)
    .sort(compareFileNames)
    .map((fileName) => ({ fileName, absolutePath: join(directory, fileName) }));
};
