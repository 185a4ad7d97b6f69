import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

export type AjvOptions = {
  /** Coerce scalar strings (environment overrides) to the declared types. */
  coerceTypes?: boolean;
};

export function loadAjv(opts: AjvOptions = {}): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, coerceTypes: opts.coerceTypes ?? false });
  add(ajv);

  return ajv;
}

/** Compile a schema into a type guard for `T`. */
export function compileGuard<T>(ajv: AjvInstance, schema: unknown): {
  check: (data: unknown) => data is T;
  errors: () => string;
} {
  const validate = ajv.compile(schema);
  return {
    check: (data: unknown): data is T => validate(data),
    errors: () => ajv.errorsText(validate.errors),
  };
}
