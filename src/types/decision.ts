import { Budget } from "./policy";

export type Verdict =
  | { allowed: true; remaining: number }
  | { allowed: false; remaining: 0; retryAfterSeconds: number };

export type ResolutionErrorCode =
  | "CredentialMissing"
  | "CredentialInvalid"
  | "MissingAddress";

export interface ResolutionError {
  code: ResolutionErrorCode;
  message: string;
}

export type Decision =
  | { ok: true; identity: string; budget: Budget; verdict: Verdict }
  | { ok: false; error: ResolutionError };
