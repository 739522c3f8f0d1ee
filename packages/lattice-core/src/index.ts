export { priceAmerican, latticeParams, BINOMIAL_SUB_METHOD } from './binomial';
export type { AmericanSpec, LatticeOptions, LatticeOutput, LatticeParams } from './types';
