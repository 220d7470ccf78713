import AjvModule, { type Options as AjvOptions } from 'ajv';
import addFormatsModule from 'ajv-formats';

// Both packages are CommonJS; under NodeNext the default import is the
// module object, whose `default` export is the class and the plugin.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export type AjvInstance = InstanceType<typeof Ajv>;

/**
 * Ajv instance shared by the repository reader, the schema client and the
 * configuration loader. Formats (uri, date, ...) are always registered.
 */
export function createAjv(options: AjvOptions = {}): AjvInstance {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
    ...options,
  });
  addFormats(ajv);
  return ajv;
}

/** One line per Ajv error, e.g. `/severity/info must be array`. */
export function formatAjvErrors(
  errors: ReadonlyArray<{ instancePath: string; message?: string }> | null | undefined
): string {
  if (!errors || errors.length === 0) return 'unknown validation error';
  return errors
    .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}
