import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

// ajv and ajv-formats are CommonJS; their default export types do not line up under NodeNext.
export function loadAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}
