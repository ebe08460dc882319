export { createRequest, INVALID_TIMEOUT_MESSAGE, RequestBuilder, type RequestOptions, type SendOptions } from './builder.js';
export { prepareRequest, FILES_REQUIRE_FORM_BODY_MESSAGE } from './prepare.js';
export { formatAuthorization } from './auth.js';
