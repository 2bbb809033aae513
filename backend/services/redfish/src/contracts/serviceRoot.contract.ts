// backend/services/redfish/src/contracts/serviceRoot.contract.ts
import { z } from "zod";

/** `GET /redfish`: version map, exactly one key. */
export const AliasDocumentContract = z
  .object({
    v1: z.literal("/redfish/v1/"),
  })
  .strict();

export type AliasDocument = z.infer<typeof AliasDocumentContract>;

const ODATA_TYPE_SERVICE_ROOT = /^#ServiceRoot\.v\d+_\d+_\d+\.ServiceRoot$/;

/** `GET /redfish/v1/`: identity fields every client probes for. */
export const ServiceRootContract = z
  .object({
    "@odata.id": z.literal("/redfish/v1"),
    "@odata.type": z.string().regex(ODATA_TYPE_SERVICE_ROOT, {
      message: "@odata.type must be #ServiceRoot.vX_Y_Z.ServiceRoot",
    }),
    Id: z.literal("RootService"),
    Name: z.literal("Root Service"),
  })
  .passthrough();

export type ServiceRootDocument = z.infer<typeof ServiceRootContract>;
