import type { PackTarArchiveOptions, TarEntry, TarEntryType } from "./tar.types";

export const TAR_BLOCK_SIZE = 512;
// Writers pad the archive to a whole record of 20 blocks.
export const TAR_RECORD_SIZE = TAR_BLOCK_SIZE * 20;

const TAR_NAME_LENGTH = 100;
const TAR_PREFIX_OFFSET = 345;
const TAR_PREFIX_LENGTH = 155;
const TAR_CHECKSUM_OFFSET = 148;
const TAR_CHECKSUM_LENGTH = 8;
const TAR_TYPE_OFFSET = 156;
const USTAR_MAGIC = "ustar\0";

const FILE_MODE = 0o644;
const DIRECTORY_MODE = 0o755;

const TYPE_FLAGS: Record<TarEntryType, string> = {
  file: "0",
  directory: "5",
};

const formatOctal = (value: number, fieldLength: number): string => {
  return `${value.toString(8).padStart(fieldLength - 1, "0")}\0`;
};

const computeHeaderChecksum = (header: Buffer): number => {
  let checksum = 0;
  for (let index = 0; index < TAR_BLOCK_SIZE; index += 1) {
    const isChecksumField =
      index >= TAR_CHECKSUM_OFFSET && index < TAR_CHECKSUM_OFFSET + TAR_CHECKSUM_LENGTH;
    checksum += isChecksumField ? 0x20 : header[index];
  }

  return checksum;
};

const getHeaderName = (entry: TarEntry): string => {
  const trimmedName = entry.name.replace(/\/+$/, "");
  return entry.type === "directory" ? `${trimmedName}/` : trimmedName;
};

const createHeader = (entry: TarEntry, modifiedAtSeconds: number): Buffer => {
  const headerName = getHeaderName(entry);
  if (Buffer.byteLength(headerName, "utf8") > TAR_NAME_LENGTH) {
    throw new Error(`Invalid tar entry: name is longer than ${TAR_NAME_LENGTH} bytes: ${headerName}`);
  }

  const size = entry.type === "directory" ? 0 : entry.data.length;
  const header = Buffer.alloc(TAR_BLOCK_SIZE, 0);

  header.write(headerName, 0, TAR_NAME_LENGTH, "utf8");
  header.write(formatOctal(entry.type === "directory" ? DIRECTORY_MODE : FILE_MODE, 8), 100, 8, "ascii");
  header.write(formatOctal(0, 8), 108, 8, "ascii");
  header.write(formatOctal(0, 8), 116, 8, "ascii");
  header.write(formatOctal(size, 12), 124, 12, "ascii");
  header.write(formatOctal(modifiedAtSeconds, 12), 136, 12, "ascii");
  header.write(TYPE_FLAGS[entry.type], TAR_TYPE_OFFSET, 1, "ascii");
  header.write(USTAR_MAGIC, 257, 6, "ascii");
  header.write("00", 263, 2, "ascii");

  const checksum = computeHeaderChecksum(header);
  header.write(formatOctal(checksum, 7), TAR_CHECKSUM_OFFSET, 7, "ascii");
  header[TAR_CHECKSUM_OFFSET + 7] = 0x20;

  return header;
};

/**
 * Packs entries into an uncompressed ustar archive, in the order given.
 */
export const packTarArchive = (
  entries: readonly TarEntry[],
  { modifiedAt = new Date() }: PackTarArchiveOptions = {}
): Buffer => {
  const modifiedAtSeconds = Math.floor(modifiedAt.getTime() / 1000);
  const blocks: Buffer[] = [];
  let length = 0;

  const push = (block: Buffer) => {
    blocks.push(block);
    length += block.length;
  };

  for (const entry of entries) {
    push(createHeader(entry, modifiedAtSeconds));
    if (entry.type === "directory" || entry.data.length === 0) {
      continue;
    }

    push(entry.data);
    const remainder = entry.data.length % TAR_BLOCK_SIZE;
    if (remainder > 0) {
      push(Buffer.alloc(TAR_BLOCK_SIZE - remainder, 0));
    }
  }

  push(Buffer.alloc(TAR_BLOCK_SIZE * 2, 0));
  const recordRemainder = length % TAR_RECORD_SIZE;
  if (recordRemainder > 0) {
    push(Buffer.alloc(TAR_RECORD_SIZE - recordRemainder, 0));
  }

  return Buffer.concat(blocks, length);
};

const readNulTerminated = (field: Buffer): string => {
  const terminatorIndex = field.indexOf(0);
  return field.subarray(0, terminatorIndex === -1 ? field.length : terminatorIndex).toString("utf8");
};

export const normalizeTarEntryName = (name: string): string => {
  return name.replace(/^(?:\.\/|\/)+/, "").replace(/\/+$/, "");
};

const readEntryType = (typeFlag: number): TarEntryType | null => {
  // NUL is the pre-POSIX flag for a regular file.
  if (typeFlag === 0 || typeFlag === 0x30) {
    return "file";
  }

  if (typeFlag === 0x35) {
    return "directory";
  }

  return null;
};

/**
 * Reads regular files and directories out of an uncompressed tar archive.
 * Links, devices and pax extension headers are skipped.
 */
export const extractTarArchive = (archive: Uint8Array): TarEntry[] => {
  const source = Buffer.from(archive.buffer, archive.byteOffset, archive.byteLength);
  const entries: TarEntry[] = [];
  let offset = 0;

  while (offset + TAR_BLOCK_SIZE <= source.length) {
    const header = source.subarray(offset, offset + TAR_BLOCK_SIZE);
    if (header.every((byte) => byte === 0)) {
      break;
    }

    const rawSize = readNulTerminated(header.subarray(124, 136)).trim();
    const size = parseInt(rawSize || "0", 8);
    if (Number.isNaN(size)) {
      throw new Error(`Invalid tar archive: bad size field at offset ${offset}.`);
    }

    const baseName = readNulTerminated(header.subarray(0, TAR_NAME_LENGTH));
    const isUstar = header.subarray(257, 262).toString("ascii") === "ustar";
    const prefix = isUstar
      ? readNulTerminated(header.subarray(TAR_PREFIX_OFFSET, TAR_PREFIX_OFFSET + TAR_PREFIX_LENGTH))
      : "";
    const dataOffset = offset + TAR_BLOCK_SIZE;
    if (dataOffset + size > source.length) {
      throw new Error(`Invalid tar archive: entry ${baseName} is truncated.`);
    }

    const type = readEntryType(header[TAR_TYPE_OFFSET]);
    if (type) {
      entries.push({
        name: normalizeTarEntryName(prefix ? `${prefix}/${baseName}` : baseName),
        type,
        data: type === "file" ? Buffer.from(source.subarray(dataOffset, dataOffset + size)) : Buffer.alloc(0),
      });
    }

    offset = dataOffset + Math.ceil(size / TAR_BLOCK_SIZE) * TAR_BLOCK_SIZE;
  }

  return entries;
};
