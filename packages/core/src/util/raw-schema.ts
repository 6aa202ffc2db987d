import AjvModule, { type AnySchema } from 'ajv';

import { err, ok, type Result } from '../types/result.js';
import { isPlainRecord, Schema, type SchemaOrBool } from '../types/schema.js';

// ajv ships CommonJS; under NodeNext the class sits on the default export
const Ajv = AjvModule.default;

type AjvInstance = InstanceType<typeof Ajv>;

let metaValidator: AjvInstance | undefined;

/**
 * Shared draft-07 meta-schema checker. Only validateSchema is used, which
 * keeps no per-document state, so one instance serves every run.
 */
function getMetaValidator(): AjvInstance {
  if (!metaValidator) {
    metaValidator = new Ajv({
      strict: false,
      allErrors: true,
      validateFormats: false,
    });
  }
  return metaValidator;
}

function isSchemaDocument(value: unknown): value is AnySchema {
  return typeof value === 'boolean' || isPlainRecord(value);
}

/**
 * Decodes schema bytes exposed by a value and checks them against the
 * draft-07 meta-schema.
 */
export function decodeRawSchema(
  raw: string | Uint8Array
): Result<SchemaOrBool, string> {
  const text = typeof raw === 'string' ? raw : new TextDecoder().decode(raw);

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(`invalid JSON: ${reason}`);
  }

  if (!isSchemaDocument(document)) {
    return err('schema must be an object or a boolean');
  }

  const ajv = getMetaValidator();
  if (ajv.validateSchema(document) !== true) {
    return err(ajv.errorsText(ajv.errors, { dataVar: 'schema' }));
  }

  try {
    return ok(Schema.fromJSON(document));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}
