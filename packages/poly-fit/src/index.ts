import { distinctCount, polyfit, polyval, polyvalMany } from './fit/poly';

export type { PolyModel } from './fit/poly';
export { lstsqQR } from './linalg';

export const Fit = { polyfit, polyval, polyvalMany, distinctCount };
