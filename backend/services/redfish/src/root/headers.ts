// backend/services/redfish/src/root/headers.ts

export const ODATA_VERSION = "4.0";
export const ALLOWED_METHODS = "GET,HEAD";
export const JSON_CONTENT_TYPE = "application/json";

/** Carried on every response the service root (or its gate) writes. */
export const PROTOCOL_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "OData-Version": ODATA_VERSION,
  "Cache-Control": "no-cache",
});
