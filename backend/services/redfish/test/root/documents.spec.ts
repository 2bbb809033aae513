// backend/services/redfish/test/root/documents.spec.ts
import { describe, it, expect } from "vitest";
import {
  buildServiceRootDocuments,
  SERVICE_ROOT_TYPE,
} from "../../src/root/documents";
import {
  AliasDocumentContract,
  ServiceRootContract,
} from "../../src/contracts/serviceRoot.contract";
import {
  ALIAS_BODY,
  SERVICE_ROOT_BODY,
} from "../helpers/server";

describe("buildServiceRootDocuments", () => {
  const docs = buildServiceRootDocuments();

  it("serializes the alias document compactly", () => {
    expect(docs.alias.body).toBe(ALIAS_BODY);
    expect(docs.alias.describedBy).toBeUndefined();
  });

  it("serializes the service root with identity fields in order", () => {
    expect(docs.serviceRoot.body).toBe(SERVICE_ROOT_BODY);
    expect(Object.keys(docs.serviceRoot.document)).toEqual([
      "@odata.id",
      "@odata.type",
      "Id",
      "Name",
    ]);
  });

  it("advertises the ServiceRoot schema", () => {
    expect(SERVICE_ROOT_TYPE.version.toString()).toBe("v1_15_0");
    expect(docs.serviceRoot.describedBy).toBe(
      "https://redfish.dmtf.org/schemas/v1/ServiceRoot.v1_15_0.json"
    );
  });

  it("freezes documents so no request can alter them", () => {
    expect(Object.isFrozen(docs)).toBe(true);
    expect(Object.isFrozen(docs.alias)).toBe(true);
    expect(Object.isFrozen(docs.serviceRoot.document)).toBe(true);
  });

  it("produces identical bodies on every build", () => {
    const again = buildServiceRootDocuments();
    expect(again.serviceRoot.body).toBe(docs.serviceRoot.body);
    expect(again.alias.body).toBe(docs.alias.body);
  });
});

describe("service root contracts", () => {
  it("rejects an alias document with extra keys", () => {
    const r = AliasDocumentContract.safeParse({ v1: "/redfish/v1/", v2: "/x" });
    expect(r.success).toBe(false);
  });

  it("rejects a malformed @odata.type", () => {
    const r = ServiceRootContract.safeParse({
      "@odata.id": "/redfish/v1",
      "@odata.type": "#ServiceRoot.1_15_0.ServiceRoot",
      Id: "RootService",
      Name: "Root Service",
    });
    expect(r.success).toBe(false);
  });

  it("accepts additional service root properties", () => {
    const r = ServiceRootContract.safeParse({
      "@odata.id": "/redfish/v1",
      "@odata.type": "#ServiceRoot.v1_15_0.ServiceRoot",
      Id: "RootService",
      Name: "Root Service",
      RedfishVersion: "1.15.0",
    });
    expect(r.success).toBe(true);
  });
});
