/**
 * Runtime configuration, read from the environment with defaults.
 * Paths are relative to the working directory, like the CLI's --file option.
 */

export interface FamilyGraphConfig {
  familyFile: string;
  logSilent: boolean;
}

const DEFAULT_FAMILY_FILE = './data/sample-family.json';

const isTruthy = (value: string | undefined): boolean =>
  value === '1' || value?.toLowerCase() === 'true';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): FamilyGraphConfig => ({
  familyFile: env.FAMILY_FILE || DEFAULT_FAMILY_FILE,
  logSilent: isTruthy(env.FAMILY_LOG_SILENT),
});

// Live object so the CLI and test setup can adjust it after import
export const config: FamilyGraphConfig = loadConfig();

export default config;
