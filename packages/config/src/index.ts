export { parseEnv, envSchema } from "./env.js";
export { SettingsStore } from "./settings-store.js";
export type { RuntimeSettingsPatch, SettingsSnapshot } from "./settings-store.js";
