import { z } from "zod";
import { formatZodErrors } from "@feedrank/kit";
import { ConfigError } from "../errors.js";

export const AggStrategy = ["mean", "sum", "min", "max"] as const;
export type AggStrategy = (typeof AggStrategy)[number];

export const Normalization = ["naive", "min-max", "log", "standard"] as const;
export type Normalization = (typeof Normalization)[number];

export const Insertion = ["append", "prepend", "middle", "random"] as const;
export type Insertion = (typeof Insertion)[number];

export const ScorerConfigSchema = z
  .object({
    /** Score only the latest feed instead of aggregating the open experiment. */
    perEpisode: z.boolean().default(true),
    aggStrategy: z.enum(AggStrategy).default("sum"),
    normalization: z.enum(Normalization).default("naive"),
    logBase: z
      .number()
      .positive()
      .refine((b) => b !== 1, { message: "log base must not be 1" })
      .default(10),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    scorer: ScorerConfigSchema.default({}),
    selector: z.string().min(1).default("score-order"),
    /** Max unseen items injected per optimization episode. */
    nTry: z.number().int().nonnegative().default(0),
    insertion: z.enum(Insertion).default("append"),
    population: z
      .array(z.string().min(1))
      .transform((keys) => [...new Set(keys)])
      .optional(),
    populationGrowth: z.boolean().default(false),
    episodeCeiling: z.number().int().positive().optional(),
    optInterval: z.number().int().positive().default(1),
    earlyStopPatience: z.number().int().positive().optional(),
    earlyStopStartAt: z.number().int().nonnegative().default(0),
    restartOnStagnation: z.boolean().default(false),
    /** xorshift32 seed; the generator keeps 32 bits of state. */
    seed: z
      .number()
      .int()
      .gte(-(2 ** 31))
      .lte(2 ** 31 - 1)
      .default(1),
  })
  .strict();

export type ScorerConfig = z.output<typeof ScorerConfigSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/** Validate and default an engine configuration. Throws ConfigError listing every issue. */
export function parseEngineConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatZodErrors(result.error));
  }
  return result.data;
}
