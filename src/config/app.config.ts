import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Payoff engine
  PAYOFF_CACHE_TTL_SECONDS: z.coerce.number().min(0).default(300), // 0 = never expires
  DEFAULT_PRICE_RANGE: z.coerce.number().min(0).default(20),
  DEFAULT_TICK_SIZE: z.coerce.number().positive().default(0.01),

  // Commission: base + per leg
  COMMISSION_BASE_FEE: z.coerce.number().min(0).default(4.95),
  COMMISSION_PER_LEG_FEE: z.coerce.number().min(0).default(0.65),

  // false: no quote source, every premium is 0
  MARKET_DATA_ENABLED: booleanFlag,
});

export type AppConfig = z.infer<typeof configSchema>;

export const APP_CONFIG = 'APP_CONFIG';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${problems}`);
  }
  return result.data;
}
