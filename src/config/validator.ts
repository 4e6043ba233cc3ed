import Ajv from "ajv";
import type { LgiConfig } from "../types/config.js";

const stringList = { type: "array", items: { type: "string", minLength: 1 } };

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "recon_command",
    "reference_dir_env",
    "strip_env",
    "shared_assets",
    "surf_subdir",
    "lgi_outputs",
    "license_env",
    "version_file",
  ],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    recon_command: { type: "string", minLength: 1 },
    reference_dir_env: { type: "string", minLength: 1 },
    strip_env: stringList,
    shared_assets: stringList,
    surf_subdir: { type: "string", minLength: 1 },
    lgi_outputs: { ...stringList, minItems: 1 },
    license_env: { type: "string", minLength: 1 },
    version_file: { type: "string", minLength: 1 },
  },
};

type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

// ajv is CommonJS; under NodeNext its default import is the constructor itself.
const AjvCtor = Ajv as unknown as { new (opts: unknown): AjvInstance };
const ajv = new AjvCtor({ allErrors: true, strict: true });
const validate = ajv.compile(CONFIG_SCHEMA);

export type ConfigValidationResult =
  | { valid: true; config: LgiConfig }
  | { valid: false; errors: string };

function isLgiConfig(data: unknown): data is LgiConfig {
  return validate(data);
}

/** Validate a merged config object against the config schema. */
export function validateConfig(data: unknown): ConfigValidationResult {
  if (isLgiConfig(data)) return { valid: true, config: data };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
