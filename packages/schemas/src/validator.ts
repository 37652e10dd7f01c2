import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { InteractRequestSchema } from "./interact-request.schema.js";
import { SiteProfilesSchema } from "./site-profiles.schema.js";
import type { CommandRequest, SiteProfile } from "./types.js";

// Both packages are CommonJS; under ESM the default import is module.exports,
// which carries the class / plugin on `.default`.
const ajv = new Ajv.default({ allErrors: true, strict: false });
addFormats.default(ajv);

const validateInteract: ValidateFunction<CommandRequest> = ajv.compile<CommandRequest>(InteractRequestSchema);
const validateProfiles: ValidateFunction<SiteProfilesDocument> = ajv.compile<SiteProfilesDocument>(SiteProfilesSchema);

export interface SiteProfilesDocument {
  profiles: SiteProfile[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateInteractRequest(data: unknown): ValidationResult {
  const valid = validateInteract(data);
  return toResult(valid, validateInteract.errors);
}

export function validateSiteProfiles(data: unknown): ValidationResult {
  const valid = validateProfiles(data);
  return toResult(valid, validateProfiles.errors);
}

export function isSiteProfilesDocument(data: unknown): data is SiteProfilesDocument {
  return validateProfiles(data);
}

export function isInteractRequest(data: unknown): data is CommandRequest {
  return validateInteract(data);
}
