import {
  IdentityResolution,
  IdentityResolver,
  presentAddress,
  rejected,
} from "./identityResolver";
import { RequestAttributes } from "../types/request";

// header values and addresses never contain a newline
const IDENTITY_SEPARATOR = "\n";

/**
 * Combines a presented API key with the source address.
 *
 * The same key used from two addresses is tracked as two identities; the
 * key alone selects the budget (returned as `policyKey`).
 */
export class CredentialIdentityResolver implements IdentityResolver {
  private readonly known: ReadonlySet<string>;

  constructor(knownCredentials: Iterable<string>) {
    this.known = new Set(
      Array.from(knownCredentials, (credential) => credential.trim())
    );
  }

  resolve(attributes: RequestAttributes): IdentityResolution {
    const credential = attributes.credential?.trim();
    if (!credential) {
      return rejected("CredentialMissing", "API key is missing");
    }

    if (!this.known.has(credential)) {
      return rejected("CredentialInvalid", "Invalid API key");
    }

    const address = presentAddress(attributes);
    if (!address) {
      return rejected("MissingAddress", "Request has no client information");
    }

    return {
      ok: true,
      identity: `${credential}${IDENTITY_SEPARATOR}${address}`,
      policyKey: credential,
    };
  }
}
