export type ConfigurationErrorCode =
  | "BAD_FISCAL_YEAR"
  | "EMPTY_HISTORY"
  | "INVALID_PARAMS"
  | "INVALID_ALIAS_TABLE";

/**
 * A usage error: the caller asked for something the model cannot do.
 * Missing data is never reported this way; it shows up as `null` metrics.
 */
export class ConfigurationError extends Error {
  code: ConfigurationErrorCode;
  details?: string[];

  constructor(opts: { code: ConfigurationErrorCode; message: string; details?: string[] }) {
    super(opts.message);
    this.name = "ConfigurationError";
    this.code = opts.code;
    this.details = opts.details;
  }
}

export const isConfigurationError = (err: unknown): err is ConfigurationError => err instanceof ConfigurationError;
