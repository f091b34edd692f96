/**
 * Engine configuration: regional defaults and policy knobs.
 *
 * Every value is a plain fraction or count. Callers resolve an effective value
 * with {@link resolveSetting}: explicit argument first, then the user's
 * profile, then this configuration.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';

const fraction = z.number().min(0).max(1);

/**
 * Engine configuration schema with validation.
 */
export const EngineConfigSchema = z
  .object({
    // Mortgage assumptions
    interest_rate: z.number().min(0).max(1),
    loan_term_years: z.number().int().min(1).max(50),
    property_tax_rate: fraction,
    insurance_rate: fraction,
    pmi_rate: fraction,
    /** Down payment fraction at or above which PMI is not charged */
    pmi_down_payment_threshold: fraction,
    down_payment_fraction: fraction,
    hoa_monthly: z.number().min(0),

    // Affordability policy
    /** Share of gross monthly income that housing may consume */
    front_end_dti_limit: fraction,
    /** Back-end DTI (percent) above which a warning is raised */
    dti_warning_percent: z.number().min(0),
    reserve_months: z.number().min(0),
    emergency_buffer_target_months: z.number().min(0),
    closing_cost_rate: fraction,
    safe_range_floor: fraction,

    // Metrics policy
    /** Minimum-payment proxy: share of a credit card balance due monthly */
    credit_payment_rate: fraction,
    /** Minimum-payment proxy: share of a loan balance due monthly */
    loan_payment_rate: fraction,
    window_months: z.number().int().min(1).max(24),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  interest_rate: 0.07,
  loan_term_years: 30,
  property_tax_rate: 0.012,
  insurance_rate: 0.005,
  pmi_rate: 0.005,
  pmi_down_payment_threshold: 0.2,
  down_payment_fraction: 0.2,
  hoa_monthly: 0,

  front_end_dti_limit: 0.28,
  dti_warning_percent: 43,
  reserve_months: 6,
  emergency_buffer_target_months: 6,
  closing_cost_rate: 0.03,
  safe_range_floor: 0.8,

  credit_payment_rate: 0.03,
  loan_payment_rate: 0.01,
  window_months: 3,
});

/**
 * Build a configuration from partial overrides on top of the defaults.
 *
 * @throws ZodError if an override is out of range
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return EngineConfigSchema.parse({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
}

/**
 * Load configuration overrides from a JSON file.
 *
 * @param configPath - Path to a JSON object with any subset of config keys
 * @throws Error if the file is missing, is not JSON, or fails validation
 */
export function loadEngineConfig(configPath?: string): EngineConfig {
  if (!configPath) {
    return createEngineConfig();
  }

  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file is not valid JSON (${configPath}): ${message}`);
  }

  const overrides = EngineConfigSchema.partial().parse(raw);
  return createEngineConfig(overrides);
}

/**
 * Pick the first defined value: explicit argument > profile value > default.
 */
export function resolveSetting<T>(
  explicit: T | undefined,
  profileValue: T | undefined,
  configured: T
): T {
  if (explicit !== undefined) return explicit;
  if (profileValue !== undefined) return profileValue;
  return configured;
}
