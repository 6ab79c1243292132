/**
 * Instance type tables used for spot alternatives and cost comparisons.
 */

/**
 * Cheaper or sibling types to check when a spot price is over budget
 */
export const ALTERNATIVE_INSTANCE_TYPES: Record<string, string[]> = {
  'g4dn.xlarge': ['g5.xlarge', 'g6.xlarge', 'c5.xlarge', 'm5.xlarge'],
  'g4dn.2xlarge': ['g4dn.xlarge', 'g5.xlarge', 'c5.2xlarge', 'm5.2xlarge'],
  'g5.xlarge': ['g4dn.xlarge', 'g6.xlarge', 'c5.xlarge'],
};

/**
 * On-demand hourly price in us-east-1, used only for savings estimates
 */
export const ONDEMAND_HOURLY_PRICES: Record<string, number> = {
  'g4dn.xlarge': 0.526,
  'g4dn.2xlarge': 0.752,
  'g5.xlarge': 1.006,
  't3.medium': 0.0416,
};

/**
 * Families that get the larger root volume and the GPU image
 */
export const GPU_FAMILY_PATTERN = /^(g4dn|g5|g6|p3|p4|p5)\./;

export function isGpuInstanceType(instanceType: string): boolean {
  return GPU_FAMILY_PATTERN.test(instanceType);
}
