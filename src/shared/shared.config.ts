export const DEFAULT_DEVICE_SKU = "TE032AS001";
export const DEVICE_SKU_ENV_KEY = "PPAK_DEVICE_SKU";
export const DEBUG_ENV_KEY = "PPAK_DEBUG";

export const getConfiguredDeviceSku = (): string => {
  const configuredDeviceSku = process.env[DEVICE_SKU_ENV_KEY];
  return configuredDeviceSku?.trim() || DEFAULT_DEVICE_SKU;
};

export const isArchiveDebugEnabled = (): boolean => {
  return process.env[DEBUG_ENV_KEY]?.trim() === "1";
};
