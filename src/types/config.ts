/**
 * Configuration document schemas and the records built from them
 */

import { z } from 'zod';

export const SETTINGS_FILE_NAME = 'forge.yaml';

export const SUPPORTED_INPUT_TYPES = ['string', 'number'] as const;
export type SupportedInputType = (typeof SUPPORTED_INPUT_TYPES)[number];

export const OUTPUT_FORMATS = ['raw', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * A string field that also takes YAML numbers and booleans, so `version: 1.0`
 * or `PORT: 8080` read as text. Numbers go through `String`, so `1.0` reads
 * as `"1"`.
 */
function scalarString(schema: z.ZodString = z.string()) {
  return z.preprocess(
    value => (typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
    schema
  );
}

export const serverSettingsSchema = z.object({
  name: scalarString().nullish(),
  version: scalarString().nullish(),
  url: z.string().min(1, 'url is required'),
  token_command: z.string().nullish(),
  env: z.record(z.string(), scalarString()).nullish(),
  env_passthrough: z.boolean().nullish()
});

export const inputSpecSchema = z.object({
  name: scalarString(z.string().min(1)),
  // Checked against SUPPORTED_INPUT_TYPES at registration, not here
  type: z.string(),
  description: scalarString().nullish(),
  required: z.boolean().nullish()
});

export const toolAnnotationsSchema = z.object({
  title: z.string().optional(),
  readOnlyHint: z.boolean().optional(),
  destructiveHint: z.boolean().optional(),
  idempotentHint: z.boolean().optional(),
  openWorldHint: z.boolean().optional()
});

export const toolDefinitionSchema = z.object({
  name: scalarString(z.string().min(1, 'name is required')),
  description: scalarString().nullish(),
  query: z.string().min(1, 'query is required'),
  inputs: z.array(inputSpecSchema).nullish(),
  annotations: toolAnnotationsSchema.nullish(),
  output: z.string().nullish()
});

export interface ServerSettings {
  readonly name: string;
  readonly version: string;
  readonly url: string;
  readonly tokenCommand?: string;
  readonly env: Readonly<Record<string, string>>;
  readonly envPassthrough: boolean;
}

export interface InputSpec {
  readonly name: string;
  readonly type: string;
  readonly description: string;
  readonly required: boolean;
}

export type ToolAnnotations = z.infer<typeof toolAnnotationsSchema>;

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly query: string;
  readonly inputs: readonly InputSpec[];
  readonly annotations?: ToolAnnotations;
  readonly output: OutputFormat;
  readonly sourceFile: string;
}

export interface AppConfig {
  configDir: string;
  isDebug: boolean;
  httpAddress?: string;
  settings: ServerSettings;
}
