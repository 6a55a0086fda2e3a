export interface AudioAssetFile {
  fileName: string;
  absolutePath: string;
}
