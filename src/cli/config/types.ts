/**
 * CLI configuration types
 */

/**
 * Configuration file structure (.json, .yaml or .yml)
 */
export interface FlatcolConfig {
  separator?: string;
  logLevel?: string;
  schema?: {
    order?: string[];
  };
}

/**
 * CLI command options (from commander)
 */
export interface SchemaCommandOptions {
  schema: string;
  order?: string;
  separator?: string;
  outputPath?: string;
  config?: string;
}

export interface FlattenCommandOptions {
  inputPath: string;
  outputPath?: string;
  separator?: string;
  config?: string;
}

export type GlobalOptions = {
  logLevel?: string;
};
