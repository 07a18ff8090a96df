//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from 'joi';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
interface CommonEnv {
  NODE_ENV: string;
}

const schema = joi.object<CommonEnv>({
  NODE_ENV: joi.string()
    .valid('development', 'production', 'test')
    .default('development')
}).unknown() // allows for extra fields (i.e that we don't check for) in the object being checked.
  .required();


//-------------------------------------------------
// Validate
//-------------------------------------------------
// It's important to use the 'value' that joi spits out from now on, as joi has the power to do type conversion and add defaults.
const result = schema.validate(process.env);

if (result.error) {
  throw new Error(`An error occured whilst validating process.env: ${result.error.message}`);
}

const envVars = result.value;


//-------------------------------------------------
// Create config object
//-------------------------------------------------
export const common = {
  appName: 'level2-audit-manager',
  env: envVars.NODE_ENV
};
