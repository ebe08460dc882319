export { putBody, URL_ENCODED_MIME_TYPE, FILES_ATTACHED_MESSAGE, type BodyResult } from './put-body.js';
export { validateParts, validateFileParts, isFieldPart, isFilePart, PART_GUIDANCE } from './parts.js';
export { encodeJson, encodeQuery, toFieldPairs, isFormFields } from './encoders.js';
