export { normCdf } from './normal';
export { blackScholesPrice } from './blackScholes';
export type { BsInputs } from './blackScholes';
export { SeededRandom } from './random';
export { assertFinite, mean } from './utils';
