/**
 * Set-centric document validation (Ajv)
 */

import Ajv from 'ajv';
import type { SetCentricDocument } from '../../../shared/types';
import schema from './contracts/set-centric.schema.json';

const ajv = new Ajv({ allErrors: true, strict: true });
const validate = ajv.compile<SetCentricDocument>(schema);

export type ValidationResult =
  | { ok: true; document: SetCentricDocument }
  | { ok: false; errors: string };

export function validateSetCentricDocument(json: unknown): ValidationResult {
  if (!validate(json)) {
    const errors = ajv.errorsText(validate.errors, { separator: '\n' });
    return { ok: false, errors };
  }
  return { ok: true, document: json };
}
