import { z } from "zod";

const NonBlank = z.string().refine(s => s.trim().length > 0, { message: "must not be empty or whitespace-only" });

export const IdSchema = z.coerce.number().int().positive().safe();

export const LoadLimitSchema = z.number().int().positive().safe();

export const WeightSchema = z.number().int().min(1).max(100);

export const OperatorCreateSchema = z.object({
  name: NonBlank,
  maxLoadLimit: LoadLimitSchema
});

export const OperatorUpdateSchema = z.object({
  maxLoadLimit: LoadLimitSchema
});

export const SourceCreateSchema = z.object({
  name: NonBlank,
  identifier: NonBlank
});

export const WeightConfigSchema = z.object({
  weights: z.array(z.object({
    operatorId: IdSchema,
    weight: WeightSchema
  }))
});

export const RequestCreateSchema = z.object({
  userIdentifier: NonBlank,
  sourceId: IdSchema,
  message: NonBlank
});

export function describeIssues(err: z.ZodError): string {
  return err.issues
    .map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
