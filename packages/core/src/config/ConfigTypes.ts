/** File name looked up in the home directory when no path is given. */
export const DEFAULT_CONFIG_FILE = '.pipeask.yaml';

/** Keys recognized in the YAML config file. */
export type ConfigKey = 'api_key' | 'model' | 'max_tokens';
