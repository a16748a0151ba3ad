import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const BatchSchema = z.object({
  perJobTimeoutMs: z.number().positive(),
  concurrency: z.number().int().min(1),
  pauseMs: z.object({
    min: z.number().nonnegative(),
    max: z.number().nonnegative(),
  }).refine((p) => p.min <= p.max, { message: "pauseMs.min must not exceed pauseMs.max" }),
  requireTickers: z.boolean().default(true),
});

export const SurfaceSchema = z.object({
  strikeGrid: z.array(z.number().positive()).min(1),
  atmStrike: z.number().positive(),
  bucketCount: z.number().int().min(1),
  halfMonthRounding: z.enum(["up", "down"]),
  expiryTieBreak: z.enum(["earlier", "later"]),
  strikeTolerance: z.number().nonnegative(),
}).refine(
  (s) =>
    s.strikeGrid.every((k, i) =>
      s.strikeGrid.every((o, j) => j >= i || Math.abs(o - k) > s.strikeTolerance * Math.max(1, Math.abs(o)))
    ),
  { message: "strikeGrid has duplicate strikes", path: ["strikeGrid"] }
);

export const RatePointSchema = z.object({
  tenorYears: z.number().positive(),
  rate: z.number(),
});

export const DiscountSchema = z.object({
  method: z.string().min(1),
  interestRate: z.number(),
  curves: z.record(z.string(), z.array(RatePointSchema).min(1)),
});

export const SourceSchema = z.object({
  kind: z.enum(["file", "deribit"]),
  dir: z.string().min(1),
  deribit: z.object({
    network: z.enum(["mainnet", "testnet"]),
    rpcTimeoutMs: z.number().positive(),
    snapTolerancePct: z.number().positive(),
  }),
});

export const OutputSchema = z.object({
  dir: z.string().min(1),
  save: z.boolean(),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  tickersFile: z.string().min(1),
  batch: BatchSchema,
  surface: SurfaceSchema,
  discount: DiscountSchema,
  source: SourceSchema,
  output: OutputSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
