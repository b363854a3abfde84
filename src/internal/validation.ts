import { z } from 'zod';
import type { ResolvedConfig } from './types.js';
import { ConfigurationError } from '../errors.js';

const unitInterval = z.number().min(0).max(1);

const configSchema = z
  .object({
    strategy: z.enum(['global', 'adaptive']),
    method: z.enum(['minimum-cross-entropy', 'otsu', 'robust-background', 'sauvola', 'manual', 'measurement']),
    otsuClasses: z.union([z.literal(2), z.literal(3)]),
    assignMiddleToForeground: z.boolean(),
    logTransform: z.boolean(),
    correctionFactor: z.number().finite().nonnegative(),
    thresholdMin: unitInterval,
    thresholdMax: unitInterval,
    manualThreshold: unitInterval,
    windowSize: z.number().int().positive(),
    smoothingScale: z.number().finite().nonnegative(),
    lowerOutlierFraction: unitInterval,
    upperOutlierFraction: unitInterval,
    averagingMethod: z.enum(['mean', 'median', 'mode']),
    varianceMethod: z.enum(['standard-deviation', 'median-absolute-deviation']),
    numberOfDeviations: z.number().finite(),
    sauvolaK: z.number().finite(),
    sauvolaR: z.number().finite().positive(),
    automatic: z.boolean(),
    debug: z.boolean(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.thresholdMin > config.thresholdMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thresholdMin'],
        message: `must not exceed thresholdMax (${config.thresholdMin} > ${config.thresholdMax})`,
      });
    }
    if (config.lowerOutlierFraction + config.upperOutlierFraction >= 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['upperOutlierFraction'],
        message: `lower and upper outlier fractions must sum to less than 1 (${config.lowerOutlierFraction} + ${config.upperOutlierFraction})`,
      });
    }
    // Automatic mode replaces strategy and method, so their pairing is moot.
    if (config.automatic) return;
    if (config.strategy === 'global' && config.method === 'sauvola') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['method'],
        message: 'sauvola is only available with the adaptive strategy',
      });
    }
    if (config.strategy === 'adaptive' && (config.method === 'manual' || config.method === 'measurement')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['method'],
        message: `${config.method} is only available with the global strategy`,
      });
    }
  });

/** Validate a resolved config; the first problem becomes a ConfigurationError. */
export function validateConfig(config: ResolvedConfig): ResolvedConfig {
  const parsed = configSchema.safeParse(config);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const parameter = issue.path.length > 0 ? issue.path.join('.') : undefined;
  throw new ConfigurationError(`resolveConfig: ${parameter ?? 'config'}: ${issue.message}`, {
    stage: 'configuration',
    parameter,
  });
}
