import { Request } from "express";
import { RequestAttributes } from "../types/request";

export const DEFAULT_CREDENTIAL_HEADER = "x-api-key";

/**
 * Pulls the attributes identity resolution works from.
 *
 * The address is `req.ip`, so it follows the app's "trust proxy" setting.
 */
export function getRequestAttributes(
  req: Request,
  credentialHeader: string = DEFAULT_CREDENTIAL_HEADER
): RequestAttributes {
  return {
    address: req.ip ?? req.socket.remoteAddress,
    credential: req.header(credentialHeader),
  };
}
