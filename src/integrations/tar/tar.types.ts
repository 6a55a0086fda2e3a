export type TarEntryType = "file" | "directory";

export interface TarEntry {
  name: string;
  type: TarEntryType;
  data: Buffer;
}

export interface PackTarArchiveOptions {
  modifiedAt?: Date;
}
