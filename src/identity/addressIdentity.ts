import { createHash } from "crypto";
import {
  IdentityResolution,
  IdentityResolver,
  presentAddress,
  rejected,
} from "./identityResolver";
import { RequestAttributes } from "../types/request";

export function hashAddress(address: string): string {
  return createHash("sha256").update(address).digest("hex");
}

/**
 * Tracks callers by a SHA-256 digest of their source address, so raw IPs
 * never end up as map keys.
 */
export class AddressIdentityResolver implements IdentityResolver {
  resolve(attributes: RequestAttributes): IdentityResolution {
    const address = presentAddress(attributes);
    if (!address) {
      return rejected("MissingAddress", "Request has no client information");
    }

    return { ok: true, identity: hashAddress(address) };
  }
}
