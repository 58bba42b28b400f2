import Ajv2020Module from "ajv/dist/2020.js";
import type { ErrorObject } from "ajv";

// CommonJS with an `exports.default`; under NodeNext the default import is the module object.
const Ajv2020 = Ajv2020Module.default;

export type AjvInstance = InstanceType<typeof Ajv2020>;
export type { ErrorObject };

let shared: AjvInstance | null = null;

/**
 * One strict, all-errors Ajv instance per process. `useDefaults` fills omitted keys from the schema;
 * `coerceTypes` turns string values from the environment into the schema's number and boolean types.
 */
export function loadAjv(): AjvInstance {
  if (shared) return shared;
  shared = new Ajv2020({ allErrors: true, strict: true, useDefaults: true, coerceTypes: true });
  return shared;
}
