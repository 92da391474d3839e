import { v4 as uuidv4 } from "uuid";

/**
 * Produces the unique identifier embedded in a new manifest.
 */
export type IdentifierPolicy = () => string;

export const uuidIdentifier: IdentifierPolicy = () => `urn:uuid:${uuidv4()}`;

export function fixedIdentifier(value: string): IdentifierPolicy {
  return () => value;
}
