export const ENGINE_VERSION = '1.0.0' as const;
export const CONTRACT_VERSION = '1' as const;
