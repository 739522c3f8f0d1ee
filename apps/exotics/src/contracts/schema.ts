import { z } from "zod";
import { ValidationError } from "core-types";
import type { ForwardStartContract, QuantoContract } from "core-types";

const finite = () => z.number().finite();
const nonNegative = () => finite().nonnegative();

export const RightSchema = z.string().toLowerCase().pipe(z.enum(["call", "put"]));

export const UnderlyingSchema = z.object({
  spot: nonNegative(),
  vol: nonNegative(),
  q: nonNegative(),
});

const BaseContractSchema = z.object({
  ref: UnderlyingSchema,
  right: RightSchema,
  K: nonNegative().optional(),
  T: finite().positive(),
  rate: nonNegative(),
});

export const ForwardStartSchema = BaseContractSchema.extend({
  kind: z.literal("forwardStart"),
  startTime: nonNegative(),
});

export const QuantoSchema = BaseContractSchema.extend({
  kind: z.literal("quanto"),
  foreignRate: nonNegative(),
  fxVol: nonNegative(),
  correlation: finite(),
});

/** A contract after validation: strike filled in from spot. */
export type Resolved<C> = Omit<C, "K"> & { K: number };

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(context, formatIssues(result.error));
  }
  return result.data;
}

export function validateForwardStart(input: ForwardStartContract): Resolved<ForwardStartContract> {
  const c = parseWith(ForwardStartSchema, input, "forward-start contract");
  return { ...c, K: c.K ?? c.ref.spot };
}

export function validateQuanto(input: QuantoContract): Resolved<QuantoContract> {
  const c = parseWith(QuantoSchema, input, "quanto contract");
  return { ...c, K: c.K ?? c.ref.spot };
}
