export interface PakMetadata {
  info: string;
  pak_version: 1;
  pak_type: "user";
  pak_release: string;
  device_name: string;
  device_sku: string;
  device_version: string;
  generated_at: string;
  author: string;
  base_sku: string;
}

export interface SaveProjectArchiveOptions {
  /** Directory whose `.wav` files are copied into `/sounds/`. */
  soundsDir?: string;
  generatedAt?: Date;
}

export interface SaveProjectArchiveResult {
  outputPath: string;
  memberPaths: string[];
}
