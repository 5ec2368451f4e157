// pattern: Functional Core
import { Ajv } from "ajv";
import ajvErrors from "ajv-errors";

// Singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  code: { optimize: true },
  allowUnionTypes: true,
  // Required for ajv-errors
  allErrors: true,
});

// Custom `errorMessage` keywords on our schemas
ajvErrors.default(ajv);

export { ajv };
