// backend/services/redfish/src/root/documents.ts

/**
 * Why:
 * - The alias and service root documents never change for the life of the
 *   process. Build them once, validate against the contract, freeze, and keep
 *   the serialized body so every response is byte-identical.
 */

import {
  AliasDocumentContract,
  ServiceRootContract,
  type AliasDocument,
  type ServiceRootDocument,
} from "../contracts/serviceRoot.contract";
import {
  ResourceSchemaVersion,
  describedBy,
  odataType,
  type ResourceType,
} from "./resourceType";

export const CANONICAL_V1_PATH = "/redfish/v1/";
export const SERVICE_ROOT_ODATA_ID = "/redfish/v1";

export const SERVICE_ROOT_TYPE: ResourceType = Object.freeze({
  name: "ServiceRoot",
  version: new ResourceSchemaVersion(1, 15, 0),
  termName: "ServiceRoot",
});

export interface PreparedDocument<T> {
  readonly document: Readonly<T>;
  /** Compact JSON, serialized once. */
  readonly body: string;
  /** Schema URL for the `Link: <...>; rel=describedby` header, when the document has one. */
  readonly describedBy?: string;
}

export interface ServiceRootDocuments {
  readonly alias: PreparedDocument<AliasDocument>;
  readonly serviceRoot: PreparedDocument<ServiceRootDocument>;
}

export function buildServiceRootDocuments(): ServiceRootDocuments {
  const alias = AliasDocumentContract.parse({ v1: CANONICAL_V1_PATH });

  const serviceRoot = ServiceRootContract.parse({
    "@odata.id": SERVICE_ROOT_ODATA_ID,
    "@odata.type": odataType(SERVICE_ROOT_TYPE),
    Id: "RootService",
    Name: "Root Service",
  });

  return Object.freeze({
    alias: prepare(alias),
    serviceRoot: prepare(serviceRoot, describedBy(SERVICE_ROOT_TYPE)),
  });
}

function prepare<T extends object>(
  document: T,
  schemaUrl?: string
): PreparedDocument<T> {
  const frozen = Object.freeze(document);
  return Object.freeze({
    document: frozen,
    body: JSON.stringify(frozen),
    ...(schemaUrl ? { describedBy: schemaUrl } : {}),
  });
}
