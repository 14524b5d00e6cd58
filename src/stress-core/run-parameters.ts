import { z } from 'zod';
import { CATALOG_TYPES, DEFAULT_RUN_PARAMETERS } from '@shared/constants';
import { ConfigurationError } from '@shared/errors';

export const runParametersSchema = z
  .object({
    rupture_source: z.string().trim().min(1),
    coefficient_of_friction: z
      .number()
      .min(0)
      .max(1)
      .default(DEFAULT_RUN_PARAMETERS.coefficientOfFriction),
    lame_lambda: z.number().positive().default(DEFAULT_RUN_PARAMETERS.lameLambda),
    shear_modulus_mu: z.number().positive().default(DEFAULT_RUN_PARAMETERS.shearModulusMu),
    near_field_distance: z.number().positive().default(DEFAULT_RUN_PARAMETERS.nearFieldDistance),
    spacing_grid: z.number().positive().default(DEFAULT_RUN_PARAMETERS.spacingGrid),
    obs_depth: z.number().max(0).default(DEFAULT_RUN_PARAMETERS.obsDepth),
    days: z.number().int().positive().default(DEFAULT_RUN_PARAMETERS.days),
    catalog_type: z.enum(CATALOG_TYPES).default(DEFAULT_RUN_PARAMETERS.catalogType),
  })
  .transform((input) => ({
    ruptureSource: input.rupture_source,
    coefficientOfFriction: input.coefficient_of_friction,
    lameLambda: input.lame_lambda,
    shearModulusMu: input.shear_modulus_mu,
    nearFieldDistance: input.near_field_distance,
    spacingGrid: input.spacing_grid,
    obsDepth: input.obs_depth,
    days: input.days,
    catalogType: input.catalog_type,
  }));

export type RunParameters = z.output<typeof runParametersSchema>;

export function validateRunParameters(
  input: unknown,
): { success: true; data: RunParameters } | { success: false; error: string } {
  const result = runParametersSchema.safeParse(input);
  if (!result.success) {
    const error = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { success: false, error };
  }
  return { success: true, data: result.data };
}

/** Like validateRunParameters, but throws ConfigurationError on invalid input. */
export function parseRunParameters(input: unknown): RunParameters {
  const result = validateRunParameters(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid run parameters: ${result.error}`);
  }
  return result.data;
}
