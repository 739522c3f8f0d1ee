import type { ContractKind } from './index';

export class PricingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Out-of-range or malformed contract, option or config fields. */
export class ValidationError extends PricingError {
  readonly issues: string[];

  constructor(context: string, issues: string[]) {
    super(`${context}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** Singular regressions, degenerate lattices, non-finite intermediates. */
export class NumericalError extends PricingError {}

export class UnsupportedMethodError extends PricingError {
  readonly kind: ContractKind;
  readonly method: string;

  constructor(kind: ContractKind, method: string) {
    super(`No '${method}' pricer for ${kind} options`);
    this.kind = kind;
    this.method = method;
  }
}
