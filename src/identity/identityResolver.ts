import { ResolutionError, ResolutionErrorCode } from "../types/decision";
import { RequestAttributes } from "../types/request";

export type IdentityResolution =
  | { ok: true; identity: string; policyKey?: string }
  | { ok: false; error: ResolutionError };

export interface IdentityResolver {
  resolve(attributes: RequestAttributes): IdentityResolution;
}

export function rejected(
  code: ResolutionErrorCode,
  message: string
): IdentityResolution {
  return { ok: false, error: { code, message } };
}

export function presentAddress(attributes: RequestAttributes): string | null {
  const address = attributes.address?.trim();
  return address ? address : null;
}
