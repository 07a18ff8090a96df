//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from 'joi';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
export type AuditMode = 'application' | 'trigger';

interface AuditEnv {
  AUDIT_MODE: AuditMode;
}

const schema = joi.object<AuditEnv>({
  // 'application': this service writes the audit rows in the same transaction as the delete.
  // 'trigger': a BEFORE DELETE trigger is installed and the database writes them.
  AUDIT_MODE: joi.string()
    .valid('application', 'trigger')
    .default('application')
}).unknown()
  .required();


//-------------------------------------------------
// Validate
//-------------------------------------------------
const result = schema.validate(process.env);

if (result.error) {
  throw new Error(`An error occured whilst validating process.env: ${result.error.message}`);
}

const envVars = result.value;


//-------------------------------------------------
// Create config object
//-------------------------------------------------
export const audit = {
  mode: envVars.AUDIT_MODE
};
