/**
 * CLI option types
 */

/**
 * Global CLI options available on all commands
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Options that describe a plan inline when no plan file is given
 */
export interface PlanOptions {
  source?: string;
  dest?: string;
  pattern?: string[];
  timeRange?: string;
  minSize?: string;
  backend?: string;
  name?: string;
}

export interface CopyOptions extends PlanOptions {
  /** false when --no-resume was given */
  resume: boolean;
  verify?: boolean;
}
