/**
 * Barrel re-export for provider utility modules.
 */

export { postJson } from "./http.js";
export type { JsonResponse, PostJsonOptions } from "./http.js";

export { mapHttpError, mapTransportError } from "./error-mapping.js";
