// backend/services/redfish/src/root/resourceType.ts

/**
 * Schema identity for Redfish resources.
 *
 * - Versions render as `vMAJOR_MINOR_BUILD` (e.g. `v1_15_0`).
 * - `@odata.type` is `#<name>.<version>.<term>`.
 * - The describedby link points at the DMTF-published JSON schema.
 */

export const DMTF_JSON_SCHEMA_BASE = "https://redfish.dmtf.org/schemas/v1";

export class ResourceSchemaVersion {
  public constructor(
    public readonly major: number,
    public readonly minor: number,
    public readonly build: number
  ) {
    for (const part of [major, minor, build]) {
      if (!Number.isInteger(part) || part < 0) {
        throw new Error(
          `ResourceSchemaVersion: parts must be non-negative integers (got ${major}.${minor}.${build})`
        );
      }
    }
  }

  public toString(): string {
    return `v${this.major}_${this.minor}_${this.build}`;
  }
}

export interface ResourceType {
  readonly name: string;
  readonly version: ResourceSchemaVersion;
  readonly termName: string;
}

export function odataType(type: ResourceType): string {
  return `#${type.name}.${type.version.toString()}.${type.termName}`;
}

export function describedBy(type: ResourceType): string {
  return `${DMTF_JSON_SCHEMA_BASE}/${type.name}.${type.version.toString()}.json`;
}
