// backend/services/redfish/src/root/ServiceRootRouter.ts

/**
 * Why:
 * - The service root surface is four exact paths. Keep the decision of what
 *   each request gets in one pure, framework-free place so it is trivially
 *   testable and so the Express layer only copies status/headers/body.
 *
 * Order of checks:
 *   path -> NotFound (any method) -> 405 (non GET/HEAD) -> 412 (OData-Version)
 *   -> redirect or document.
 *
 * Notes:
 * - Paths match exactly: no case folding, no trailing-slash normalization
 *   beyond the table, query strings are not part of `path`.
 * - HEAD gets the same headers as GET; the transport drops the body.
 */

import {
  CANONICAL_V1_PATH,
  type PreparedDocument,
  type ServiceRootDocuments,
} from "./documents";
import {
  ALLOWED_METHODS,
  JSON_CONTENT_TYPE,
  ODATA_VERSION,
  PROTOCOL_HEADERS,
} from "./headers";

export type RouteKind =
  | "AliasDocument"
  | "ServiceRootDocument"
  | "RedirectToCanonical"
  | "NotFound";

const ROUTE_TABLE: ReadonlyMap<string, RouteKind> = new Map<string, RouteKind>([
  ["/redfish", "AliasDocument"],
  ["/redfish/", "AliasDocument"],
  ["/redfish/v1", "RedirectToCanonical"],
  ["/redfish/v1/", "ServiceRootDocument"],
]);

export function resolveRoute(path: string): RouteKind {
  return ROUTE_TABLE.get(path) ?? "NotFound";
}

export interface RootRequest {
  method: string;
  path: string;
  /** Raw `OData-Version` request header, if the client sent one. */
  odataVersion?: string;
}

export interface RootResponse {
  status: number;
  headers: Readonly<Record<string, string>>;
  /** Empty string for bodiless responses. */
  body: string;
}

export class ServiceRootRouter {
  public constructor(private readonly documents: ServiceRootDocuments) {}

  public resolve(path: string): RouteKind {
    return resolveRoute(path);
  }

  public handle(req: RootRequest): RootResponse {
    const kind = resolveRoute(req.path);
    if (kind === "NotFound") return empty(404);

    const method = req.method.toUpperCase();
    if (method !== "GET" && method !== "HEAD") {
      return empty(405, { Allow: ALLOWED_METHODS });
    }

    if (
      req.odataVersion !== undefined &&
      req.odataVersion.trim() !== ODATA_VERSION
    ) {
      return empty(412);
    }

    switch (kind) {
      case "RedirectToCanonical":
        return empty(308, { Location: CANONICAL_V1_PATH });
      case "AliasDocument":
        return json(this.documents.alias);
      case "ServiceRootDocument":
        return json(this.documents.serviceRoot);
    }
  }
}

function empty(
  status: number,
  extra: Record<string, string> = {}
): RootResponse {
  return {
    status,
    headers: { ...PROTOCOL_HEADERS, ...extra, "Content-Length": "0" },
    body: "",
  };
}

function json<T>(doc: PreparedDocument<T>): RootResponse {
  const headers: Record<string, string> = {
    ...PROTOCOL_HEADERS,
    Allow: ALLOWED_METHODS,
    "Content-Type": JSON_CONTENT_TYPE,
    "Content-Length": String(Buffer.byteLength(doc.body, "utf8")),
  };
  if (doc.describedBy) headers.Link = `<${doc.describedBy}>; rel=describedby`;
  return { status: 200, headers, body: doc.body };
}
