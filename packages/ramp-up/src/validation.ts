/**
 * Zod schemas for descriptor and configuration validation.
 */

import type { ValidationIssue } from "@onramp/errors";
import { z } from "zod";

export const HostKindSchema = z.enum(["github", "huggingface", "generic", "none"]);

export const LogLevelSchema = z.enum(["silent", "error", "warn", "info", "debug"]);

const PathSegmentSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[^/\s]+$/, "must be a single path segment");

const BranchSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^\S+$/, "must not contain whitespace");

const HostnameSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[a-z0-9.-]+(?::\d+)?$/i, "must be a hostname, optionally with a port");

export const ResourceDescriptorInputSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    localDir: z.string().min(1).optional(),
    hostKind: HostKindSchema.default("none"),
    host: HostnameSchema.optional(),
    owner: PathSegmentSchema.optional(),
    repo: PathSegmentSchema.optional(),
    branchCandidates: z.array(BranchSchema).optional(),
  })
  .superRefine((input, ctx) => {
    if (input.hostKind === "none") {
      if (input.localDir === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["localDir"],
          message: "a descriptor without a remote host needs a local directory",
        });
      }
      return;
    }
    if (input.owner === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["owner"],
        message: `owner is required for ${input.hostKind} descriptors`,
      });
    }
    if (input.repo === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["repo"],
        message: `repo is required for ${input.hostKind} descriptors`,
      });
    }
    if (input.hostKind === "generic" && input.host === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["host"],
        message: "host is required for generic descriptors",
      });
    }
  });

export type ResourceDescriptorInput = z.input<typeof ResourceDescriptorInputSchema>;

export const RampUpConfigSchema = z.object({
  timeoutMs: z.number().int().min(100).max(120_000).optional(),
  offline: z.boolean().optional(),
  branches: z.array(BranchSchema).min(1).optional(),
  logLevel: LogLevelSchema.optional(),
});

/**
 * Flatten zod issues into the error package's field-level shape.
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * One-line summary of validation issues, e.g. `owner: Required; repo: Required`.
 */
export function summarizeIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
}
