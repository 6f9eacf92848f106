/**
 * Reference distributions for the hypothesis tests
 */

export type { Distribution, CumulativeDistribution } from './Distribution';
export {
  NormalDistribution,
  standardNormalCdf,
  standardNormalSf,
  standardNormalQuantile,
} from './NormalDistribution';
export { StudentTDistribution } from './StudentTDistribution';
export { ChiSquareDistribution } from './ChiSquareDistribution';
export { FDistribution } from './FDistribution';
export { NoncentralTDistribution } from './NoncentralTDistribution';

import { NormalDistribution } from './NormalDistribution';

/**
 * Standard normal distribution N(0, 1)
 */
export function createStandardNormal(): NormalDistribution {
  return new NormalDistribution(0, 1);
}
