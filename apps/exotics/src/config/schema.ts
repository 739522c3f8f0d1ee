import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const LatticeDefaultsSchema = z.object({
  nsteps: z.number().int().positive(),
});

export const MonteCarloDefaultsSchema = z.object({
  nsteps: z.number().int().positive(),
  npaths: z.number().int().positive(),
  seed: z.number().int(),
  deg: z.number().int().nonnegative(),
  itmOnly: z.boolean(),
});

export const AppConfigSchema = z.object({
  defaults: z.object({
    lattice: LatticeDefaultsSchema,
    monteCarlo: MonteCarloDefaultsSchema,
  }),
  logging: z.object({
    level: LogLevelSchema,
  }),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
